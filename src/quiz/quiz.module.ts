import { Module } from '@nestjs/common';

import { CountriesModule } from '../countries/countries.module';
import { QuizService } from './quiz.service';
import { mathRandom, RANDOM_SOURCE } from './random';

@Module({
  imports: [CountriesModule],
  providers: [QuizService, { provide: RANDOM_SOURCE, useValue: mathRandom }],
  exports: [QuizService],
})
export class QuizModule {}
