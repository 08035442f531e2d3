import { Module } from '@nestjs/common';

import { ConsoleModule } from '../console/console.module';
import { QuizModule } from '../quiz/quiz.module';
import { QuizCliService } from './quiz-cli.service';

@Module({
  imports: [QuizModule, ConsoleModule],
  providers: [QuizCliService],
})
export class CliModule {}
