import { Body, Controller, Delete, Get, HttpCode, Param, ParseIntPipe, Patch, Post } from '@nestjs/common';
import { QuizzesService } from './quizzes.service';
import { QuizAnalyticsService } from './quiz-analytics.service';
import { CurrentActor } from '../auth/current-actor.decorator';
import { Actor } from '../auth/actor';
import { CreateQuestionDto, CreateQuizDto } from '../dto/create-quiz.dto';
import { UpdateQuizDto } from '../dto/update-quiz.dto';
import { SubmitQuizDto } from '../dto/submit-quiz.dto';

@Controller('quizzes')
export class QuizzesController {
  constructor(
    private readonly quizzesService: QuizzesService,
    private readonly analyticsService: QuizAnalyticsService,
  ) {}

  @Post()
  async create(@CurrentActor() actor: Actor, @Body() dto: CreateQuizDto) {
    return this.quizzesService.createQuiz(actor, dto);
  }

  @Get('subjects/:subjectId')
  async listForSubject(@CurrentActor() actor: Actor, @Param('subjectId', ParseIntPipe) subjectId: number) {
    return this.quizzesService.listQuizzes(actor, subjectId);
  }

  @Get('results')
  async results(@CurrentActor() actor: Actor) {
    return this.quizzesService.listResults(actor);
  }

  @Get('me/analytics')
  async myAnalytics(@CurrentActor() actor: Actor) {
    return this.analyticsService.studentAnalytics(actor);
  }

  @Get('me/weak-areas')
  async myWeakAreas(@CurrentActor() actor: Actor) {
    return this.analyticsService.weakAreas(actor);
  }

  @Patch('questions/:questionId')
  async updateQuestion(
    @CurrentActor() actor: Actor,
    @Param('questionId', ParseIntPipe) questionId: number,
    @Body() dto: CreateQuestionDto,
  ) {
    return this.quizzesService.updateQuestion(actor, questionId, dto);
  }

  @Delete('questions/:questionId')
  @HttpCode(204)
  async deleteQuestion(@CurrentActor() actor: Actor, @Param('questionId', ParseIntPipe) questionId: number): Promise<void> {
    await this.quizzesService.deleteQuestion(actor, questionId);
  }

  @Get(':id')
  async take(@CurrentActor() actor: Actor, @Param('id', ParseIntPipe) id: number) {
    return this.quizzesService.getQuizForTaking(actor, id);
  }

  @Get(':id/answers')
  async withAnswers(@CurrentActor() actor: Actor, @Param('id', ParseIntPipe) id: number) {
    return this.quizzesService.getQuizWithAnswers(actor, id);
  }

  @Get(':id/analytics')
  async analytics(@CurrentActor() actor: Actor, @Param('id', ParseIntPipe) id: number) {
    return this.analyticsService.quizAnalytics(actor, id);
  }

  @Get(':id/performance')
  async performance(@CurrentActor() actor: Actor, @Param('id', ParseIntPipe) id: number) {
    return this.analyticsService.studentPerformance(actor, id);
  }

  @Patch(':id')
  async update(
    @CurrentActor() actor: Actor,
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: UpdateQuizDto,
  ) {
    return this.quizzesService.updateQuiz(actor, id, dto);
  }

  @Post(':id/questions')
  async addQuestion(
    @CurrentActor() actor: Actor,
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: CreateQuestionDto,
  ) {
    return this.quizzesService.addQuestion(actor, id, dto);
  }

  @Post(':id/submit')
  async submit(
    @CurrentActor() actor: Actor,
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: SubmitQuizDto,
  ) {
    return this.quizzesService.submitQuiz(actor, id, dto.answers);
  }

  @Delete(':id')
  @HttpCode(204)
  async delete(@CurrentActor() actor: Actor, @Param('id', ParseIntPipe) id: number): Promise<void> {
    await this.quizzesService.deleteQuiz(actor, id);
  }
}
