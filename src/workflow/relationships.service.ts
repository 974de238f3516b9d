import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { FindOptionsWhere, In, Repository } from 'typeorm';
import { SubjectTeacher, InvitationStatus } from './subject-teacher.entity';
import { StudentSubject, EnrollmentStatus } from './student-subject.entity';
import { StateConflictException } from '../common/exceptions';
import { isUniqueViolation } from '../common/database-errors';

export type InvitationChanges = Partial<Pick<SubjectTeacher, 'status' | 'invitedBy' | 'invitedAt' | 'acceptedAt' | 'respondedAt'>>;
export type EnrollmentChanges = Partial<Pick<StudentSubject, 'status' | 'requestedAt' | 'approvedAt' | 'decidedBy' | 'withdrawnAt'>>;

/**
 * Reads and writes of the two link tables. Every state change is a single
 * conditional UPDATE guarded by the expected current status, so a row that
 * moved in the meantime is simply not touched.
 */
@Injectable()
export class RelationshipsService {
	private readonly logger = new Logger(RelationshipsService.name);

	constructor(
		@InjectRepository(SubjectTeacher)
		private readonly invitationRepo: Repository<SubjectTeacher>,
		@InjectRepository(StudentSubject)
		private readonly enrollmentRepo: Repository<StudentSubject>,
	) { }

	// ==================== INVITATIONS (subject <-> teacher) ====================

	async findInvitation(subjectId: number, teacherId: number): Promise<SubjectTeacher | null> {
		return this.invitationRepo.findOne({ where: { subjectId, teacherId } });
	}

	async createInvitation(subjectId: number, teacherId: number, invitedBy: number): Promise<SubjectTeacher> {
		const invitation = this.invitationRepo.create({
			subjectId,
			teacherId,
			invitedBy,
			status: 'pending',
			invitedAt: new Date(),
			acceptedAt: null,
			respondedAt: null,
		});
		try {
			return await this.invitationRepo.save(invitation);
		} catch (error) {
			if (isUniqueViolation(error)) {
				this.logger.warn(`Concurrent invitation for subject ${subjectId} / teacher ${teacherId}`);
				throw new StateConflictException('Teacher already invited to this subject');
			}
			throw error;
		}
	}

	/**
	 * Moves the invitation of the pair from one of `from` to the given state.
	 * Returns false when no row in an expected state exists.
	 */
	async transitionInvitation(
		subjectId: number,
		teacherId: number,
		from: InvitationStatus[],
		changes: InvitationChanges,
	): Promise<boolean> {
		const result = await this.invitationRepo.update({ subjectId, teacherId, status: In(from) }, changes);
		return (result.affected ?? 0) > 0;
	}

	async deleteInvitation(subjectId: number, teacherId: number): Promise<boolean> {
		const result = await this.invitationRepo.delete({ subjectId, teacherId });
		return (result.affected ?? 0) > 0;
	}

	async findInvitationsByTeacher(teacherId: number, status?: InvitationStatus): Promise<SubjectTeacher[]> {
		const where: FindOptionsWhere<SubjectTeacher> = status ? { teacherId, status } : { teacherId };
		return this.invitationRepo.find({ where, order: { invitedAt: 'DESC' } });
	}

	async findInvitationsBySubject(subjectId: number, status?: InvitationStatus): Promise<SubjectTeacher[]> {
		const where: FindOptionsWhere<SubjectTeacher> = status ? { subjectId, status } : { subjectId };
		return this.invitationRepo.find({ where, order: { invitedAt: 'DESC' } });
	}

	async findAllInvitations(): Promise<SubjectTeacher[]> {
		return this.invitationRepo.find({ order: { invitedAt: 'DESC' } });
	}

	async hasAcceptedInvitation(teacherId: number, subjectId: number): Promise<boolean> {
		const count = await this.invitationRepo.count({ where: { teacherId, subjectId, status: 'accepted' } });
		return count > 0;
	}

	async acceptedTeacherIds(subjectId: number): Promise<number[]> {
		const invitations = await this.findInvitationsBySubject(subjectId, 'accepted');
		return invitations.map(invitation => invitation.teacherId);
	}

	async managedSubjectIds(teacherId: number): Promise<number[]> {
		const invitations = await this.findInvitationsByTeacher(teacherId, 'accepted');
		return invitations.map(invitation => invitation.subjectId);
	}

	// ==================== ENROLLMENTS (student <-> subject) ====================

	async findEnrollment(studentId: number, subjectId: number): Promise<StudentSubject | null> {
		return this.enrollmentRepo.findOne({ where: { studentId, subjectId } });
	}

	async createEnrollment(studentId: number, subjectId: number): Promise<StudentSubject> {
		const enrollment = this.enrollmentRepo.create({
			studentId,
			subjectId,
			status: 'pending',
			requestedAt: new Date(),
			approvedAt: null,
			decidedBy: null,
			withdrawnAt: null,
		});
		try {
			return await this.enrollmentRepo.save(enrollment);
		} catch (error) {
			if (isUniqueViolation(error)) {
				this.logger.warn(`Concurrent enrollment request for student ${studentId} / subject ${subjectId}`);
				throw new StateConflictException('Enrollment request already exists');
			}
			throw error;
		}
	}

	async transitionEnrollment(
		studentId: number,
		subjectId: number,
		from: EnrollmentStatus[],
		changes: EnrollmentChanges,
	): Promise<boolean> {
		const result = await this.enrollmentRepo.update({ studentId, subjectId, status: In(from) }, changes);
		return (result.affected ?? 0) > 0;
	}

	async findEnrollmentsByStudent(studentId: number, status?: EnrollmentStatus): Promise<StudentSubject[]> {
		const where: FindOptionsWhere<StudentSubject> = status ? { studentId, status } : { studentId };
		return this.enrollmentRepo.find({ where, order: { requestedAt: 'DESC' } });
	}

	async findEnrollmentsBySubjects(subjectIds: number[], status?: EnrollmentStatus): Promise<StudentSubject[]> {
		if (subjectIds.length === 0) {
			return [];
		}
		const where: FindOptionsWhere<StudentSubject> = status
			? { subjectId: In(subjectIds), status }
			: { subjectId: In(subjectIds) };
		return this.enrollmentRepo.find({ where, order: { requestedAt: 'DESC' } });
	}

	async findAllEnrollments(): Promise<StudentSubject[]> {
		return this.enrollmentRepo.find({ order: { requestedAt: 'DESC' } });
	}

	async isEnrolled(studentId: number, subjectId: number): Promise<boolean> {
		const count = await this.enrollmentRepo.count({ where: { studentId, subjectId, status: 'approved' } });
		return count > 0;
	}
}
