import { User } from './users/user.entity';
import { Subject } from './subjects/subject.entity';
import { SubjectTeacher } from './workflow/subject-teacher.entity';
import { StudentSubject } from './workflow/student-subject.entity';
import { Notification } from './notifications/notification.entity';
import { Quiz } from './quizzes/quiz.entity';
import { Question } from './quizzes/question.entity';
import { Result } from './quizzes/result.entity';
import { Weakness } from './weaknesses/weakness.entity';

export const ENTITIES = [
  User,
  Subject,
  SubjectTeacher,
  StudentSubject,
  Notification,
  Quiz,
  Question,
  Result,
  Weakness,
];
