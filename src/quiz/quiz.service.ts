import { Inject, Injectable, Logger } from '@nestjs/common';

import { Prompter } from '../console/prompter';
import { CountriesService } from '../countries/countries.service';
import { NameVariant } from '../countries/country.schema';
import { buildCondition, CountryFilter, LocationField, locationCandidates } from './condition';
import {
  generateOptions,
  isAllowedOptionCount,
  OptionCountRange,
  optionCountRange,
} from './options';
import { derivePairs, Direction, QAPair, uniqueAnswers } from './pair-deriver';
import { ConfigurationError } from './quiz.errors';
import { QuizEngine } from './quiz-engine';
import { RANDOM_SOURCE, RandomSource } from './random';
import { QuizSession } from './session';
import { Topic, TOPIC_BEHAVIORS, TopicBehavior, TOPICS } from './topics';

export interface QuizSettings {
  topic: Topic;
  direction: Direction;
  nameVariant: NameVariant;
  filters: readonly CountryFilter[];
}

export interface PreparedQuiz {
  pairs: QAPair[];
  behavior: TopicBehavior;
  direction: Direction;
  optionCounts: OptionCountRange;
}

@Injectable()
export class QuizService {
  private readonly logger = new Logger(QuizService.name);

  constructor(
    private readonly countriesService: CountriesService,
    @Inject(RANDOM_SOURCE) private readonly random: RandomSource,
  ) {}

  getTopics(): readonly Topic[] {
    return TOPICS;
  }

  getTopicLabel(topic: Topic): string {
    return TOPIC_BEHAVIORS[topic].label;
  }

  getLocations(field: LocationField): string[] {
    return locationCandidates(this.countriesService.getCountries(), field);
  }

  prepare(settings: QuizSettings): PreparedQuiz {
    const { pairs, behavior } = derivePairs(this.countriesService.getCountries(), {
      topic: settings.topic,
      direction: settings.direction,
      nameVariant: settings.nameVariant,
      condition: buildCondition(settings.filters),
    });

    const answerCount = uniqueAnswers(pairs).length;
    this.logger.debug(
      `Derived ${pairs.length} questions with ${answerCount} distinct answers for ${settings.topic}`,
    );
    if (answerCount < 2) {
      throw new ConfigurationError('Not enough possible answer options');
    }

    return {
      pairs,
      behavior,
      direction: settings.direction,
      optionCounts: optionCountRange(pairs),
    };
  }

  createEngine(prepared: PreparedQuiz, optionCount: number, prompter: Prompter): QuizEngine {
    if (!isAllowedOptionCount(prepared.optionCounts, optionCount)) {
      throw new ConfigurationError(`${optionCount} options cannot be offered for this quiz`);
    }

    const policy = generateOptions(prepared.pairs, optionCount, prepared);
    this.logger.debug(`Starting quiz in ${policy.mode} mode`);
    return new QuizEngine(
      new QuizSession(prepared.pairs),
      { behavior: prepared.behavior, direction: prepared.direction, policy },
      prompter,
      this.random,
    );
  }
}
