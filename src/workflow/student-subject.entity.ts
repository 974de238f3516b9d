import { Entity, PrimaryGeneratedColumn, Column, ManyToOne, JoinColumn, Unique } from 'typeorm';
import { Subject } from '../subjects/subject.entity';
import { User } from '../users/user.entity';

export const ENROLLMENT_STATUSES = ['pending', 'approved', 'rejected', 'withdrawn'] as const;
export type EnrollmentStatus = typeof ENROLLMENT_STATUSES[number];

export const ACTIVE_ENROLLMENT_STATUSES: EnrollmentStatus[] = ['pending', 'approved'];

@Entity('student_subjects')
@Unique('UQ_student_subjects_pair', ['studentId', 'subjectId'])
export class StudentSubject {
  @PrimaryGeneratedColumn()
  id!: number;

  @ManyToOne(() => User, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'student_id' })
  student?: User;

  @Column({ type: 'int', name: 'student_id' })
  studentId!: number;

  @ManyToOne(() => Subject, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'subject_id' })
  subject?: Subject;

  @Column({ type: 'int', name: 'subject_id' })
  subjectId!: number;

  @Column({ type: 'enum', enum: ENROLLMENT_STATUSES, default: 'pending' })
  status!: EnrollmentStatus;

  @Column({ type: 'timestamp', default: () => 'now()' })
  requestedAt!: Date;

  @Column({ type: 'timestamp', nullable: true })
  approvedAt!: Date | null;

  // Teacher who approved or rejected the request
  @Column({ type: 'int', name: 'decided_by', nullable: true })
  decidedBy!: number | null;

  @Column({ type: 'timestamp', nullable: true })
  withdrawnAt!: Date | null;
}
