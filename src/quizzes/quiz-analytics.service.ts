import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { In, Repository } from 'typeorm';
import { Quiz } from './quiz.entity';
import { Question } from './question.entity';
import { Result } from './result.entity';
import { QuizzesService } from './quizzes.service';
import { AccessService } from '../workflow/access.service';
import { UsersService } from '../users/users.service';
import { SubjectsService } from '../subjects/subjects.service';
import { Actor, assertRole } from '../auth/actor';

// share of correct answers that counts as a pass in quiz analytics
export const PASS_THRESHOLD = 0.8;
// subjects averaging below this percentage are reported as weak areas
export const WEAK_AREA_PERCENTAGE = 70;
const TREND_DAYS = 30;

export interface QuizAnalytics {
	quizId: number;
	title: string;
	totalQuestions: number;
	attempts: number;
	averageScore: number;
	maxScore: number;
	minScore: number;
	passRate: number;
}

export interface StudentPerformanceView {
	resultId: number;
	studentId: number;
	username: string | null;
	fullName: string | null;
	email: string | null;
	score: number;
	totalQuestions: number;
	percentage: number;
	submittedAt: Date;
}

export interface SubjectPerformance {
	subjectId: number;
	subjectName: string | null;
	quizCount: number;
	averageScore: number;
}

export interface DailyAverage {
	date: string;
	dailyAverage: number;
}

export interface StudentAnalytics {
	overall: {
		totalQuizzes: number;
		averageScore: number | null;
		bestScore: number | null;
		worstScore: number | null;
	};
	bySubject: SubjectPerformance[];
	recentTrend: DailyAverage[];
}

function round2(value: number): number {
	return Math.round(value * 100) / 100;
}

function percentageOf(result: Result): number {
	return (result.score * 100) / result.totalQuestions;
}

function average(values: number[]): number {
	return values.reduce((sum, value) => sum + value, 0) / values.length;
}

@Injectable()
export class QuizAnalyticsService {
	constructor(
		@InjectRepository(Quiz)
		private readonly quizRepo: Repository<Quiz>,
		@InjectRepository(Question)
		private readonly questionRepo: Repository<Question>,
		@InjectRepository(Result)
		private readonly resultRepo: Repository<Result>,
		private readonly quizzesService: QuizzesService,
		private readonly accessService: AccessService,
		private readonly usersService: UsersService,
		private readonly subjectsService: SubjectsService,
	) { }

	/**
	 * Attempts and score spread of one quiz. Scores are raw counts of correct
	 * answers; the pass rate is a percentage of attempts.
	 */
	async quizAnalytics(actor: Actor, quizId: number): Promise<QuizAnalytics> {
		const quiz = await this.managedQuiz(actor, quizId);
		const totalQuestions = await this.questionRepo.count({ where: { quizId } });
		const scores = (await this.resultRepo.find({ where: { quizId } })).map(result => result.score);

		if (scores.length === 0) {
			return { quizId, title: quiz.title, totalQuestions, attempts: 0, averageScore: 0, maxScore: 0, minScore: 0, passRate: 0 };
		}

		const passed = scores.filter(score => score >= totalQuestions * PASS_THRESHOLD).length;
		return {
			quizId,
			title: quiz.title,
			totalQuestions,
			attempts: scores.length,
			averageScore: round2(average(scores)),
			maxScore: Math.max(...scores),
			minScore: Math.min(...scores),
			passRate: round2((passed * 100) / scores.length),
		};
	}

	async studentPerformance(actor: Actor, quizId: number): Promise<StudentPerformanceView[]> {
		await this.managedQuiz(actor, quizId);
		const results = await this.resultRepo.find({ where: { quizId }, order: { createdAt: 'DESC', id: 'DESC' } });
		const users = new Map(
			(await this.usersService.findByIds(results.map(result => result.userId))).map(user => [user.id, user]),
		);

		return results.map(result => {
			const user = users.get(result.userId);
			return {
				resultId: result.id,
				studentId: result.userId,
				username: user?.username ?? null,
				fullName: user?.fullName ?? null,
				email: user?.email ?? null,
				score: result.score,
				totalQuestions: result.totalQuestions,
				percentage: Math.round(percentageOf(result)),
				submittedAt: result.createdAt,
			};
		});
	}

	async studentAnalytics(actor: Actor, now: Date = new Date()): Promise<StudentAnalytics> {
		assertRole(actor, 'student');
		const results = await this.resultRepo.find({ where: { userId: actor.id } });
		const percentages = results.map(percentageOf);

		const since = now.getTime() - TREND_DAYS * 24 * 60 * 60 * 1000;
		const byDay = new Map<string, number[]>();
		for (const result of results.filter(row => row.createdAt.getTime() >= since)) {
			const day = result.createdAt.toISOString().slice(0, 10);
			byDay.set(day, [...(byDay.get(day) ?? []), percentageOf(result)]);
		}

		return {
			overall: {
				totalQuizzes: results.length,
				averageScore: percentages.length ? round2(average(percentages)) : null,
				bestScore: percentages.length ? round2(Math.max(...percentages)) : null,
				worstScore: percentages.length ? round2(Math.min(...percentages)) : null,
			},
			bySubject: await this.bySubject(results),
			recentTrend: Array.from(byDay, ([date, values]) => ({ date, dailyAverage: round2(average(values)) }))
				.sort((a, b) => b.date.localeCompare(a.date)),
		};
	}

	/**
	 * Subjects where the student's average quiz percentage is below 70, weakest first.
	 */
	async weakAreas(actor: Actor): Promise<SubjectPerformance[]> {
		assertRole(actor, 'student');
		const results = await this.resultRepo.find({ where: { userId: actor.id } });
		return (await this.bySubject(results)).filter(area => area.averageScore < WEAK_AREA_PERCENTAGE);
	}

	private async managedQuiz(actor: Actor, quizId: number): Promise<Quiz> {
		assertRole(actor, 'teacher', 'admin');
		const quiz = await this.quizzesService.getQuiz(quizId);
		await this.accessService.assertCanManageSubject(actor, quiz.subjectId);
		return quiz;
	}

	private async bySubject(results: Result[]): Promise<SubjectPerformance[]> {
		if (results.length === 0) {
			return [];
		}
		const quizzes = await this.quizRepo.find({ where: { id: In(results.map(result => result.quizId)) } });
		const subjectOfQuiz = new Map(quizzes.map(quiz => [quiz.id, quiz.subjectId]));

		const grouped = new Map<number, number[]>();
		for (const result of results) {
			const subjectId = subjectOfQuiz.get(result.quizId);
			if (subjectId === undefined) {
				continue;
			}
			grouped.set(subjectId, [...(grouped.get(subjectId) ?? []), percentageOf(result)]);
		}

		const names = new Map(
			(await this.subjectsService.findByIds(Array.from(grouped.keys()))).map(subject => [subject.id, subject.name]),
		);
		return Array.from(grouped, ([subjectId, values]) => ({
			subjectId,
			subjectName: names.get(subjectId) ?? null,
			quizCount: values.length,
			averageScore: round2(average(values)),
		})).sort((a, b) => a.averageScore - b.averageScore || a.subjectId - b.subjectId);
	}
}
