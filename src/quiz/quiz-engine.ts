import { Prompter, splitTokens, toChoices } from '../console/prompter';
import { capitalize, joinValues } from './normalizer';
import { drawOptions, OptionMode, OptionPolicy } from './options';
import { Direction, QAPair } from './pair-deriver';
import { EndOfSession } from './quiz.errors';
import { RandomSource } from './random';
import { QuizSession } from './session';
import { TopicBehavior } from './topics';

export type QuizStatus = 'active' | 'complete' | 'aborted';

export interface QuizOutcome {
  status: Exclude<QuizStatus, 'active'>;
  answered: number;
  total: number;
  mistakes: number;
}

export interface QuizPlan {
  behavior: TopicBehavior;
  direction: Direction;
  policy: OptionPolicy;
}

interface Attempt {
  chosen: string[];
  expected: string[];
  adjust: (answer: string) => string;
  /** Pairs retired by a right answer. */
  answeredIds: number[];
}

const unchanged = (answer: string) => answer;

/** Adjusts each value before sorting, so the order never depends on case or accents. */
export const canonicalAnswer = (
  values: readonly string[],
  adjust: (value: string) => string,
): string => joinValues(values.map(adjust));

export const questionHead = (pair: QAPair, { behavior, direction }: QuizPlan): string =>
  direction === Direction.TOPIC_FROM_COUNTRY
    ? `${behavior.label} of ${pair.question}`
    : `country ${behavior.conjunction} ${pair.question}`;

export class QuizEngine {
  private state: QuizStatus = 'active';

  constructor(
    private readonly session: QuizSession,
    private readonly plan: QuizPlan,
    private readonly prompter: Prompter,
    private readonly random: RandomSource,
  ) {}

  get status(): QuizStatus {
    return this.state;
  }

  async run(): Promise<QuizOutcome> {
    try {
      while (!this.session.isComplete) {
        await this.playRound();
      }
      this.state = 'complete';
      this.prompter.print(this.completionMessage());
    } catch (error) {
      if (!(error instanceof EndOfSession)) {
        throw error;
      }
      this.state = 'aborted';
    }

    return {
      status: this.state === 'complete' ? 'complete' : 'aborted',
      answered: this.session.answeredCount,
      total: this.session.total,
      mistakes: this.session.mistakes,
    };
  }

  private async playRound(): Promise<void> {
    const { chosen, expected, adjust, answeredIds } = await this.attempt(this.session.draw(this.random));

    if (canonicalAnswer(chosen, adjust) === canonicalAnswer(expected, adjust)) {
      this.session.markAnswered(answeredIds);
      this.prompter.print(
        `${this.prompter.success('Right!')} Progress: ${this.session.answeredCount} out of ` +
          `${this.session.total} questions answered correctly.`,
      );
    } else {
      this.session.recordMistake();
      this.prompter.print(`${this.prompter.failure('Wrong!')} The right answer is ${joinValues(expected)}.`);
    }
  }

  private async attempt(id: number): Promise<Attempt> {
    const pair = this.session.pairs[id];
    const head = questionHead(pair, this.plan);
    const { policy } = this.plan;

    switch (policy.mode) {
      case OptionMode.FREE_TEXT: {
        return {
          chosen: await this.prompter.text(head, policy.multipleTokens),
          expected: splitTokens(pair.answer, policy.multipleTokens),
          adjust: this.plan.behavior.adjust,
          answeredIds: [id],
        };
      }
      case OptionMode.EXACT: {
        const picked = await this.prompter.selectMany(head, toChoices(policy.options), false);
        return { chosen: picked, expected: [pair.answer], adjust: unchanged, answeredIds: [id] };
      }
      case OptionMode.VARIABLE: {
        const draw = drawOptions(this.session.pairs, id, policy, this.random);
        const picked = await this.prompter.selectMany(
          head,
          toChoices(draw.options),
          policy.multipleAnswers,
        );
        return {
          chosen: picked,
          expected: [...draw.accepted],
          adjust: unchanged,
          answeredIds: draw.acceptedIds,
        };
      }
    }
  }

  private completionMessage(): string {
    const mistakes = this.session.mistakes;
    let summary = `made ${this.prompter.failure(String(mistakes))} mistakes`;
    if (mistakes === 0) {
      summary = 'did not make any mistakes';
    } else if (mistakes === 1) {
      summary = summary.slice(0, -1);
    }
    return `\n${this.prompter.success('Congratulations on completing the questionnaire!')} You ${summary}.`;
  }
}
