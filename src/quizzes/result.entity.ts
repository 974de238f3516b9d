import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, ManyToOne, JoinColumn, Unique } from 'typeorm';
import { Quiz } from './quiz.entity';

@Entity('results')
// one attempt per student and quiz
@Unique('UQ_results_user_quiz', ['userId', 'quizId'])
export class Result {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'int', name: 'user_id' })
  userId!: number;

  @ManyToOne(() => Quiz, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'quiz_id' })
  quiz?: Quiz;

  @Column({ type: 'int', name: 'quiz_id' })
  quizId!: number;

  @Column({ type: 'int' })
  score!: number;

  @Column({ type: 'int' })
  totalQuestions!: number;

  @CreateDateColumn()
  createdAt!: Date;
}
