import { Test } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { DataSource } from 'typeorm';
import { InMemoryRepository } from './in-memory-repository';
import { InMemoryDataSource, SnapshotRepository } from './in-memory-data-source';
import { User } from '../src/users/user.entity';
import { Subject } from '../src/subjects/subject.entity';
import { SubjectTeacher } from '../src/workflow/subject-teacher.entity';
import { StudentSubject } from '../src/workflow/student-subject.entity';
import { Notification } from '../src/notifications/notification.entity';
import { Weakness } from '../src/weaknesses/weakness.entity';
import { Quiz } from '../src/quizzes/quiz.entity';
import { Question } from '../src/quizzes/question.entity';
import { Result } from '../src/quizzes/result.entity';
import { UsersService } from '../src/users/users.service';
import { SubjectsService } from '../src/subjects/subjects.service';
import { RelationshipsService } from '../src/workflow/relationships.service';
import { WorkflowService } from '../src/workflow/workflow.service';
import { AccessService } from '../src/workflow/access.service';
import { NotificationsService } from '../src/notifications/notifications.service';
import { WeaknessesService } from '../src/weaknesses/weaknesses.service';
import { QuizzesService } from '../src/quizzes/quizzes.service';
import { QuizAnalyticsService } from '../src/quizzes/quiz-analytics.service';
import { Actor, UserRole } from '../src/auth/actor';

export interface WorkflowHarness {
  repos: {
    users: InMemoryRepository<User>;
    subjects: InMemoryRepository<Subject>;
    invitations: InMemoryRepository<SubjectTeacher>;
    enrollments: InMemoryRepository<StudentSubject>;
    notifications: InMemoryRepository<Notification>;
    weaknesses: InMemoryRepository<Weakness>;
    quizzes: InMemoryRepository<Quiz>;
    questions: InMemoryRepository<Question>;
    results: InMemoryRepository<Result>;
  };
  workflow: WorkflowService;
  access: AccessService;
  notifications: NotificationsService;
  weaknesses: WeaknessesService;
  quizzes: QuizzesService;
  analytics: QuizAnalyticsService;
  addUser(role: UserRole, username: string, fullName?: string): Promise<Actor>;
  addSubject(name: string, description?: string): Promise<Subject>;
}

/**
 * Wires the real services over in-memory repositories.
 */
export async function createWorkflowHarness(): Promise<WorkflowHarness> {
  const repos = {
    users: new InMemoryRepository<User>(() => new User(), {
      unique: [['username']],
      defaults: () => ({ isActive: true, email: null, fullName: null, passwordHash: null, lastLogin: null, createdAt: new Date() }),
    }),
    subjects: new InMemoryRepository<Subject>(() => new Subject(), {
      unique: [['name']],
      defaults: () => ({ description: null, createdBy: null, createdAt: new Date() }),
    }),
    invitations: new InMemoryRepository<SubjectTeacher>(() => new SubjectTeacher(), {
      unique: [['subjectId', 'teacherId']],
      defaults: () => ({ invitedBy: null, invitedAt: new Date(), acceptedAt: null, respondedAt: null }),
    }),
    enrollments: new InMemoryRepository<StudentSubject>(() => new StudentSubject(), {
      unique: [['studentId', 'subjectId']],
      defaults: () => ({ requestedAt: new Date(), approvedAt: null, decidedBy: null, withdrawnAt: null }),
    }),
    notifications: new InMemoryRepository<Notification>(() => new Notification(), {
      defaults: () => ({ isRead: false, dispatchedAt: null, createdAt: new Date() }),
    }),
    weaknesses: new InMemoryRepository<Weakness>(() => new Weakness(), {
      defaults: () => ({ description: null, createdAt: new Date() }),
    }),
    quizzes: new InMemoryRepository<Quiz>(() => new Quiz(), {
      defaults: () => ({ description: null, deadline: null, timeLimit: 0, difficultyLevel: 'beginner', createdAt: new Date() }),
    }),
    questions: new InMemoryRepository<Question>(() => new Question(), {
      defaults: () => ({ explanation: null }),
    }),
    results: new InMemoryRepository<Result>(() => new Result(), {
      unique: [['userId', 'quizId']],
      defaults: () => ({ createdAt: new Date() }),
    }),
  };

  const dataSource = new InMemoryDataSource(new Map<object, SnapshotRepository>([
    [User, repos.users],
    [Subject, repos.subjects],
    [SubjectTeacher, repos.invitations],
    [StudentSubject, repos.enrollments],
    [Notification, repos.notifications],
    [Weakness, repos.weaknesses],
    [Quiz, repos.quizzes],
    [Question, repos.questions],
    [Result, repos.results],
  ]));

  const module = await Test.createTestingModule({
    providers: [
      UsersService,
      SubjectsService,
      RelationshipsService,
      WorkflowService,
      AccessService,
      NotificationsService,
      WeaknessesService,
      QuizzesService,
      QuizAnalyticsService,
      { provide: DataSource, useValue: dataSource },
      { provide: getRepositoryToken(User), useValue: repos.users },
      { provide: getRepositoryToken(Subject), useValue: repos.subjects },
      { provide: getRepositoryToken(SubjectTeacher), useValue: repos.invitations },
      { provide: getRepositoryToken(StudentSubject), useValue: repos.enrollments },
      { provide: getRepositoryToken(Notification), useValue: repos.notifications },
      { provide: getRepositoryToken(Weakness), useValue: repos.weaknesses },
      { provide: getRepositoryToken(Quiz), useValue: repos.quizzes },
      { provide: getRepositoryToken(Question), useValue: repos.questions },
      { provide: getRepositoryToken(Result), useValue: repos.results },
    ],
  }).compile();

  return {
    repos,
    workflow: module.get(WorkflowService),
    access: module.get(AccessService),
    notifications: module.get(NotificationsService),
    weaknesses: module.get(WeaknessesService),
    quizzes: module.get(QuizzesService),
    analytics: module.get(QuizAnalyticsService),
    async addUser(role, username, fullName) {
      const user = await repos.users.save(repos.users.create({ role, username, fullName: fullName ?? null }));
      return { id: user.id, role: user.role };
    },
    async addSubject(name, description) {
      return repos.subjects.save(repos.subjects.create({ name, description: description ?? null }));
    },
  };
}
