import { Injectable, Logger } from '@nestjs/common';

import { Choice, Prompter, toChoices } from '../console/prompter';
import { NAME_VARIANTS } from '../countries/country.schema';
import { CountryFilter, FilterKind, LocationField, SizeClass } from '../quiz/condition';
import { DELIMITER } from '../quiz/normalizer';
import { Direction } from '../quiz/pair-deriver';
import { ConfigurationError, EndOfSession } from '../quiz/quiz.errors';
import { QuizOutcome } from '../quiz/quiz-engine';
import { QuizService, QuizSettings } from '../quiz/quiz.service';

export const INFO_MESSAGE = `
Info:
* Empty input ends the quiz.
* If options are given, the indices of options are accepted as answers.
* Multiple answers to a question separated by '${DELIMITER}' are possible.
* Single-choice questions are denoted with parentheses.
* Multiple-choice questions are denoted with brackets.
* Areas are rounded to two significant digits.
`;

const YES_NO: Choice<boolean>[] = [
  { label: 'yes', value: true },
  { label: 'no', value: false },
];
const NO_YES: Choice<boolean>[] = [...YES_NO].reverse();

const SIZES: Choice<SizeClass>[] = [
  { label: 'big (> 10k km²)', value: SizeClass.BIG },
  { label: 'large (> 1M km²)', value: SizeClass.LARGE },
  { label: 'small (< 10k km²)', value: SizeClass.SMALL },
];

const LOCATION_FIELDS: readonly LocationField[] = ['region', 'subregion'];

@Injectable()
export class QuizCliService {
  private readonly logger = new Logger(QuizCliService.name);

  constructor(
    private readonly quizService: QuizService,
    private readonly prompter: Prompter,
  ) {}

  /** Runs one interactive session; resolves undefined when it ends before the quiz does. */
  async run(): Promise<QuizOutcome | undefined> {
    this.prompter.print(INFO_MESSAGE);

    try {
      const settings = await this.collectSettings();
      const prepared = this.quizService.prepare(settings);
      const optionCount = await this.prompter.integer('number of options', prepared.optionCounts);
      const engine = this.quizService.createEngine(prepared, optionCount, this.prompter);

      this.prompter.print(`\nInfo: There are ${prepared.pairs.length} questions. Good luck!`);
      const outcome = await engine.run();
      this.logger.log(
        `Quiz ${outcome.status}: ${outcome.answered}/${outcome.total} answered, ${outcome.mistakes} mistakes`,
      );
      return outcome;
    } catch (error) {
      if (error instanceof EndOfSession) {
        return undefined;
      }
      if (error instanceof ConfigurationError) {
        this.prompter.print(`Error: ${error.message}.`);
        return undefined;
      }
      throw error;
    }
  }

  private async collectSettings(): Promise<QuizSettings> {
    const topic = await this.prompter.select(
      'topic',
      this.quizService.getTopics().map((value) => ({ label: value, value })),
    );
    const direction = await this.prompter.select('direction', [
      { label: `country -> ${topic}`, value: Direction.TOPIC_FROM_COUNTRY },
      { label: `country <- ${topic}`, value: Direction.COUNTRY_FROM_TOPIC },
    ]);
    const nameVariant = await this.prompter.select(
      'country names',
      NAME_VARIANTS.map((variant) => ({ label: variant, value: variant })),
    );
    const limit = await this.prompter.select('limit questions', NO_YES);
    const filters = limit ? await this.collectFilters() : [];

    return { topic, direction, nameVariant, filters };
  }

  private async collectFilters(): Promise<CountryFilter[]> {
    const kinds = await this.prompter.selectMany(
      'limiting conditions',
      Object.values(FilterKind).map((kind) => ({ label: kind, value: kind })),
    );

    const filters: CountryFilter[] = [];
    for (const kind of kinds) {
      filters.push(await this.collectFilter(kind));
    }
    return filters;
  }

  private async collectFilter(kind: FilterKind): Promise<CountryFilter> {
    switch (kind) {
      case FilterKind.INDEPENDENCE:
        return { kind, independent: await this.prompter.select('independent', YES_NO) };
      case FilterKind.LOCATION: {
        const field = await this.prompter.select(
          'location',
          LOCATION_FIELDS.map((value) => ({ label: value, value })),
        );
        const values = await this.prompter.selectMany(field, toChoices(this.quizService.getLocations(field)));
        return { kind, field, values };
      }
      case FilterKind.SIZE:
        return { kind, size: await this.prompter.select('size', SIZES) };
      case FilterKind.ISLAND:
        return { kind, island: await this.prompter.select('island', NO_YES) };
    }
  }
}
