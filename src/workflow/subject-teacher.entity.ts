import { Entity, PrimaryGeneratedColumn, Column, ManyToOne, JoinColumn, Unique } from 'typeorm';
import { Subject } from '../subjects/subject.entity';
import { User } from '../users/user.entity';

export const INVITATION_STATUSES = ['pending', 'accepted', 'rejected'] as const;
export type InvitationStatus = typeof INVITATION_STATUSES[number];

/**
 * Invitation of a teacher to manage a subject.
 */
@Entity('subject_teachers')
@Unique('UQ_subject_teachers_pair', ['subjectId', 'teacherId'])
export class SubjectTeacher {
  @PrimaryGeneratedColumn()
  id!: number;

  @ManyToOne(() => Subject, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'subject_id' })
  subject?: Subject;

  @Column({ type: 'int', name: 'subject_id' })
  subjectId!: number;

  @ManyToOne(() => User, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'teacher_id' })
  teacher?: User;

  @Column({ type: 'int', name: 'teacher_id' })
  teacherId!: number;

  // Admin who sent the invitation; receives the response notification
  @Column({ type: 'int', name: 'invited_by', nullable: true })
  invitedBy!: number | null;

  @Column({ type: 'enum', enum: INVITATION_STATUSES, default: 'pending' })
  status!: InvitationStatus;

  // reset when a rejected invitation is sent again
  @Column({ type: 'timestamp', default: () => 'now()' })
  invitedAt!: Date;

  @Column({ type: 'timestamp', nullable: true })
  acceptedAt!: Date | null;

  @Column({ type: 'timestamp', nullable: true })
  respondedAt!: Date | null;
}
