import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, ManyToOne, OneToMany, JoinColumn } from 'typeorm';
import { Subject } from '../subjects/subject.entity';
import { Question } from './question.entity';

export const DIFFICULTY_LEVELS = ['beginner', 'intermediate', 'advanced'] as const;
export type DifficultyLevel = typeof DIFFICULTY_LEVELS[number];

@Entity('quizzes')
export class Quiz {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 255 })
  title!: string;

  @ManyToOne(() => Subject, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'subject_id' })
  subject?: Subject;

  @Column({ type: 'int', name: 'subject_id' })
  subjectId!: number;

  @Column({ type: 'int', name: 'creator_id' })
  creatorId!: number;

  @Column({ type: 'text', nullable: true })
  description!: string | null;

  @Column({ type: 'enum', enum: DIFFICULTY_LEVELS, default: 'beginner' })
  difficultyLevel!: DifficultyLevel;

  // minutes, 0 means no limit
  @Column({ type: 'int', default: 0 })
  timeLimit!: number;

  @Column({ type: 'timestamp', nullable: true })
  deadline!: Date | null;

  @CreateDateColumn()
  createdAt!: Date;

  @OneToMany(() => Question, question => question.quiz)
  questions?: Question[];
}
