import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Quiz } from './quiz.entity';
import { Question } from './question.entity';
import { Result } from './result.entity';
import { QuizzesService } from './quizzes.service';
import { QuizAnalyticsService } from './quiz-analytics.service';
import { QuizzesController } from './quizzes.controller';
import { WorkflowModule } from '../workflow/workflow.module';
import { WeaknessesModule } from '../weaknesses/weaknesses.module';
import { UsersModule } from '../users/users.module';
import { SubjectsModule } from '../subjects/subjects.module';

@Module({
  imports: [TypeOrmModule.forFeature([Quiz, Question, Result]), WorkflowModule, WeaknessesModule, UsersModule, SubjectsModule],
  providers: [QuizzesService, QuizAnalyticsService],
  controllers: [QuizzesController],
})
export class QuizzesModule {}
