import { Entity, PrimaryGeneratedColumn, Column, ManyToOne, JoinColumn } from 'typeorm';
import { Quiz } from './quiz.entity';

@Entity('questions')
export class Question {
  @PrimaryGeneratedColumn()
  id!: number;

  @ManyToOne(() => Quiz, quiz => quiz.questions, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'quiz_id' })
  quiz?: Quiz;

  @Column({ type: 'int', name: 'quiz_id' })
  quizId!: number;

  @Column({ type: 'text' })
  questionText!: string;

  @Column({ type: 'jsonb' })
  options!: string[];

  // 1-based index into options
  @Column({ type: 'int' })
  correctOption!: number;

  @Column({ type: 'text', nullable: true })
  explanation!: string | null;
}
