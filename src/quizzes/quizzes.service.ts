import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, In, Repository } from 'typeorm';
import { Quiz, DifficultyLevel } from './quiz.entity';
import { Question } from './question.entity';
import { Result } from './result.entity';
import { AccessService } from '../workflow/access.service';
import { RelationshipsService } from '../workflow/relationships.service';
import { WeaknessesService } from '../weaknesses/weaknesses.service';
import { Actor, assertRole } from '../auth/actor';
import { RecordNotFoundException, StateConflictException, ValidationException } from '../common/exceptions';
import { isUniqueViolation } from '../common/database-errors';
import { CreateQuizDto, CreateQuestionDto, OPTIONS_PER_QUESTION } from '../dto/create-quiz.dto';
import { UpdateQuizDto } from '../dto/update-quiz.dto';
import { QuizAnswerDto } from '../dto/submit-quiz.dto';

// Results under this share of correct answers are recorded as a weakness
export const WEAKNESS_THRESHOLD = 0.7;
export const QUIZ_WEAKNESS_TYPE = 'quiz_performance';
const ALREADY_SUBMITTED = 'You have already completed this quiz';

export interface QuestionForTaking {
	id: number;
	questionText: string;
	options: string[];
}

export interface QuizForTaking {
	id: number;
	title: string;
	subjectId: number;
	description: string | null;
	difficultyLevel: DifficultyLevel;
	timeLimit: number;
	deadline: Date | null;
	questions: QuestionForTaking[];
}

export interface QuizSubmissionResult {
	resultId: number;
	score: number;
	totalQuestions: number;
	percentage: number;
	weaknessRecorded: boolean;
}

@Injectable()
export class QuizzesService {
	private readonly logger = new Logger(QuizzesService.name);

	constructor(
		@InjectRepository(Quiz)
		private readonly quizRepo: Repository<Quiz>,
		@InjectRepository(Question)
		private readonly questionRepo: Repository<Question>,
		@InjectRepository(Result)
		private readonly resultRepo: Repository<Result>,
		private readonly accessService: AccessService,
		private readonly relationships: RelationshipsService,
		private readonly weaknessesService: WeaknessesService,
		private readonly dataSource: DataSource,
	) { }

	async createQuiz(actor: Actor, dto: CreateQuizDto): Promise<Quiz> {
		assertRole(actor, 'teacher');
		await this.accessService.assertCanManageSubject(actor, dto.subjectId);

		const title = dto.title.trim();
		if (!title) {
			throw new ValidationException('Quiz title is required');
		}
		if (dto.questions.length === 0) {
			throw new ValidationException('A quiz needs at least one question');
		}
		dto.questions.forEach((question, index) => this.validateQuestion(question, `Question ${index + 1}`));

		const quiz = await this.dataSource.transaction(async manager => {
			const quizzes = manager.getRepository(Quiz);
			const questions = manager.getRepository(Question);

			const saved = await quizzes.save(quizzes.create({
				title,
				subjectId: dto.subjectId,
				creatorId: actor.id,
				description: dto.description?.trim() || null,
				difficultyLevel: dto.difficultyLevel ?? 'beginner',
				timeLimit: dto.timeLimit ?? 0,
				deadline: dto.deadline ? new Date(dto.deadline) : null,
			}));
			saved.questions = await questions.save(dto.questions.map(question => questions.create({
				quizId: saved.id,
				...this.questionFields(question),
			})));
			return saved;
		});

		this.logger.log(`Quiz ${quiz.id} with ${dto.questions.length} questions created by teacher ${actor.id} in subject ${dto.subjectId}`);
		return quiz;
	}

	async updateQuiz(actor: Actor, quizId: number, dto: UpdateQuizDto): Promise<Quiz> {
		assertRole(actor, 'teacher');
		const quiz = await this.getQuiz(quizId);
		await this.accessService.assertCanManageSubject(actor, quiz.subjectId);

		if (dto.title !== undefined) {
			const title = dto.title.trim();
			if (!title) {
				throw new ValidationException('Quiz title is required');
			}
			quiz.title = title;
		}
		if (dto.description !== undefined) {
			quiz.description = dto.description.trim() || null;
		}
		if (dto.difficultyLevel !== undefined) {
			quiz.difficultyLevel = dto.difficultyLevel;
		}
		if (dto.timeLimit !== undefined) {
			quiz.timeLimit = dto.timeLimit;
		}
		if (dto.deadline !== undefined) {
			quiz.deadline = dto.deadline ? new Date(dto.deadline) : null;
		}

		const saved = await this.quizRepo.save(quiz);
		this.logger.log(`Quiz ${quizId} updated by teacher ${actor.id}`);
		return saved;
	}

	/**
	 * The quiz with correct options and explanations, for the teachers who
	 * manage its subject and for admins.
	 */
	async getQuizWithAnswers(actor: Actor, quizId: number): Promise<Quiz> {
		assertRole(actor, 'teacher', 'admin');
		const quiz = await this.getQuiz(quizId);
		await this.accessService.assertCanManageSubject(actor, quiz.subjectId);
		quiz.questions = await this.questionRepo.find({ where: { quizId }, order: { id: 'ASC' } });
		return quiz;
	}

	async addQuestion(actor: Actor, quizId: number, dto: CreateQuestionDto): Promise<Question> {
		assertRole(actor, 'teacher');
		const quiz = await this.getQuiz(quizId);
		await this.accessService.assertCanManageSubject(actor, quiz.subjectId);
		this.validateQuestion(dto, 'Question');

		const question = await this.questionRepo.save(this.questionRepo.create({ quizId, ...this.questionFields(dto) }));
		this.logger.log(`Question ${question.id} added to quiz ${quizId} by teacher ${actor.id}`);
		return question;
	}

	async updateQuestion(actor: Actor, questionId: number, dto: CreateQuestionDto): Promise<Question> {
		assertRole(actor, 'teacher');
		const question = await this.getQuestion(questionId);
		const quiz = await this.getQuiz(question.quizId);
		await this.accessService.assertCanManageSubject(actor, quiz.subjectId);
		this.validateQuestion(dto, 'Question');

		Object.assign(question, this.questionFields(dto));
		const saved = await this.questionRepo.save(question);
		this.logger.log(`Question ${questionId} of quiz ${quiz.id} updated by teacher ${actor.id}`);
		return saved;
	}

	async deleteQuestion(actor: Actor, questionId: number): Promise<void> {
		assertRole(actor, 'teacher');
		const question = await this.getQuestion(questionId);
		const quiz = await this.getQuiz(question.quizId);
		await this.accessService.assertCanManageSubject(actor, quiz.subjectId);

		const remaining = await this.questionRepo.count({ where: { quizId: quiz.id } });
		if (remaining <= 1) {
			throw new ValidationException('A quiz needs at least one question');
		}
		await this.questionRepo.delete(questionId);
		this.logger.log(`Question ${questionId} removed from quiz ${quiz.id} by teacher ${actor.id}`);
	}

	async listQuizzes(actor: Actor, subjectId: number): Promise<Quiz[]> {
		await this.accessService.assertCanAccessSubject(actor, subjectId);
		return this.quizRepo.find({ where: { subjectId }, order: { createdAt: 'DESC', id: 'DESC' } });
	}

	/**
	 * The quiz as a student sees it: no correct answers, no explanations.
	 */
	async getQuizForTaking(actor: Actor, quizId: number): Promise<QuizForTaking> {
		assertRole(actor, 'student');
		const quiz = await this.getQuiz(quizId);
		await this.accessService.assertCanAccessSubject(actor, quiz.subjectId);
		const questions = await this.questionRepo.find({ where: { quizId }, order: { id: 'ASC' } });

		return {
			id: quiz.id,
			title: quiz.title,
			subjectId: quiz.subjectId,
			description: quiz.description,
			difficultyLevel: quiz.difficultyLevel,
			timeLimit: quiz.timeLimit,
			deadline: quiz.deadline,
			questions: questions.map(question => ({
				id: question.id,
				questionText: question.questionText,
				options: question.options,
			})),
		};
	}

	async submitQuiz(actor: Actor, quizId: number, answers: QuizAnswerDto[]): Promise<QuizSubmissionResult> {
		assertRole(actor, 'student');
		const quiz = await this.getQuiz(quizId);
		await this.accessService.assertCanAccessSubject(actor, quiz.subjectId);

		if (quiz.deadline && quiz.deadline.getTime() < Date.now()) {
			throw new StateConflictException('The deadline for this quiz has passed');
		}

		const previous = await this.resultRepo.findOne({ where: { userId: actor.id, quizId } });
		if (previous) {
			throw new StateConflictException(ALREADY_SUBMITTED);
		}

		const questions = await this.questionRepo.find({ where: { quizId }, order: { id: 'ASC' } });
		if (questions.length === 0) {
			throw new ValidationException('This quiz has no questions');
		}

		const questionIds = new Set(questions.map(question => question.id));
		const selected = new Map<number, number>();
		for (const answer of answers) {
			if (!questionIds.has(answer.questionId)) {
				throw new ValidationException(`Question ${answer.questionId} does not belong to quiz ${quizId}`);
			}
			selected.set(answer.questionId, answer.selectedOption);
		}

		// unanswered questions count as wrong
		const score = questions.filter(question => selected.get(question.id) === question.correctOption).length;
		const totalQuestions = questions.length;
		const percentage = Math.round((score * 100) / totalQuestions);

		const weak = score / totalQuestions < WEAKNESS_THRESHOLD;

		let result: Result;
		try {
			result = await this.dataSource.transaction(async manager => {
				const results = manager.getRepository(Result);
				const saved = await results.save(results.create({ userId: actor.id, quizId, score, totalQuestions }));
				if (weak) {
					await this.weaknessesService.record(
						actor.id,
						quiz.subjectId,
						QUIZ_WEAKNESS_TYPE,
						`Scored ${percentage}% on '${quiz.title}'`,
						manager,
					);
				}
				return saved;
			});
		} catch (error) {
			// a concurrent submission won the unique (user, quiz) pair
			if (isUniqueViolation(error)) {
				throw new StateConflictException(ALREADY_SUBMITTED);
			}
			throw error;
		}

		this.logger.log(`Student ${actor.id} scored ${score}/${totalQuestions} on quiz ${quizId}`);

		return { resultId: result.id, score, totalQuestions, percentage, weaknessRecorded: weak };
	}

	async deleteQuiz(actor: Actor, quizId: number): Promise<void> {
		assertRole(actor, 'teacher', 'admin');
		const quiz = await this.getQuiz(quizId);
		// applies to the quiz's creator as well
		await this.accessService.assertCanManageSubject(actor, quiz.subjectId);
		await this.quizRepo.delete(quiz.id);
		this.logger.log(`Quiz ${quizId} deleted by ${actor.role} ${actor.id}`);
	}

	/**
	 * Students see their own results, teachers the results of the subjects they
	 * manage, admins everything.
	 */
	async listResults(actor: Actor): Promise<Result[]> {
		if (actor.role === 'student') {
			return this.resultRepo.find({ where: { userId: actor.id }, order: { createdAt: 'DESC', id: 'DESC' } });
		}
		if (actor.role === 'admin') {
			return this.resultRepo.find({ order: { createdAt: 'DESC', id: 'DESC' } });
		}

		const subjectIds = await this.relationships.managedSubjectIds(actor.id);
		if (subjectIds.length === 0) {
			return [];
		}
		const quizzes = await this.quizRepo.find({ where: { subjectId: In(subjectIds) } });
		if (quizzes.length === 0) {
			return [];
		}
		return this.resultRepo.find({
			where: { quizId: In(quizzes.map(quiz => quiz.id)) },
			order: { createdAt: 'DESC', id: 'DESC' },
		});
	}

	async getQuiz(quizId: number): Promise<Quiz> {
		const quiz = await this.quizRepo.findOne({ where: { id: quizId } });
		if (!quiz) {
			throw new RecordNotFoundException(`Quiz ${quizId} not found`);
		}
		return quiz;
	}

	private async getQuestion(questionId: number): Promise<Question> {
		const question = await this.questionRepo.findOne({ where: { id: questionId } });
		if (!question) {
			throw new RecordNotFoundException(`Question ${questionId} not found`);
		}
		return question;
	}

	private questionFields(question: CreateQuestionDto): Pick<Question, 'questionText' | 'options' | 'correctOption' | 'explanation'> {
		return {
			questionText: question.questionText.trim(),
			options: question.options,
			correctOption: question.correctOption,
			explanation: question.explanation?.trim() || null,
		};
	}

	private validateQuestion(question: CreateQuestionDto, label: string): void {
		if (!question.questionText.trim()) {
			throw new ValidationException(`${label} has no text`);
		}
		if (question.options.length !== OPTIONS_PER_QUESTION || question.options.some(option => !option.trim())) {
			throw new ValidationException(`${label} needs exactly ${OPTIONS_PER_QUESTION} non-empty options`);
		}
		if (!Number.isInteger(question.correctOption) || question.correctOption < 1 || question.correctOption > OPTIONS_PER_QUESTION) {
			throw new ValidationException(`${label} has an invalid correct option`);
		}
	}
}
