import { Injectable } from '@nestjs/common';
import { RelationshipsService } from './relationships.service';
import { SubjectTeacher, InvitationStatus } from './subject-teacher.entity';
import { StudentSubject, EnrollmentStatus } from './student-subject.entity';
import { SubjectsService } from '../subjects/subjects.service';
import { Subject } from '../subjects/subject.entity';
import { UsersService } from '../users/users.service';
import { User } from '../users/user.entity';
import { Actor, assertRole } from '../auth/actor';
import { PermissionDeniedException } from '../common/exceptions';

export interface ManagedSubjectView {
	subjectId: number;
	name: string;
	description: string | null;
	acceptedAt: Date | null;
}

export interface EnrolledSubjectView {
	subjectId: number;
	name: string;
	description: string | null;
	approvedAt: Date | null;
}

export interface AvailableSubjectView {
	subjectId: number;
	name: string;
	description: string | null;
	enrollmentStatus: EnrollmentStatus | null;
}

export interface InvitationView {
	subjectId: number;
	subjectName: string;
	teacherId: number;
	teacherUsername: string | null;
	teacherFullName: string | null;
	status: InvitationStatus;
	invitedAt: Date;
	acceptedAt: Date | null;
}

export interface EnrollmentView {
	subjectId: number;
	subjectName: string;
	studentId: number;
	studentUsername: string | null;
	studentFullName: string | null;
	status: EnrollmentStatus;
	requestedAt: Date;
	approvedAt: Date | null;
}

export interface SubjectStudentView {
	studentId: number;
	username: string | null;
	fullName: string | null;
	email: string | null;
	status: EnrollmentStatus;
	requestedAt: Date;
	approvedAt: Date | null;
}

/**
 * Read-only projections over the link tables, scoped to what the actor is a
 * party to.
 */
@Injectable()
export class AccessService {
	constructor(
		private readonly relationships: RelationshipsService,
		private readonly subjectsService: SubjectsService,
		private readonly usersService: UsersService,
	) { }

	// ==================== TEACHER ====================

	async listTeacherSubjects(actor: Actor): Promise<ManagedSubjectView[]> {
		assertRole(actor, 'teacher');
		const invitations = await this.relationships.findInvitationsByTeacher(actor.id, 'accepted');
		const subjects = await this.subjectMap(invitations.map(invitation => invitation.subjectId));

		return invitations
			.flatMap(invitation => {
				const subject = subjects.get(invitation.subjectId);
				return subject
					? [{ subjectId: subject.id, name: subject.name, description: subject.description, acceptedAt: invitation.acceptedAt }]
					: [];
			})
			.sort((a, b) => a.name.localeCompare(b.name));
	}

	async listPendingInvitations(actor: Actor): Promise<InvitationView[]> {
		assertRole(actor, 'teacher');
		const invitations = await this.relationships.findInvitationsByTeacher(actor.id, 'pending');
		return this.toInvitationViews(invitations);
	}

	/**
	 * Pending enrollment requests across every subject the teacher manages.
	 */
	async listPendingRequests(actor: Actor): Promise<EnrollmentView[]> {
		assertRole(actor, 'teacher');
		const subjectIds = await this.relationships.managedSubjectIds(actor.id);
		const enrollments = await this.relationships.findEnrollmentsBySubjects(subjectIds, 'pending');
		return this.toEnrollmentViews(enrollments);
	}

	/**
	 * Students of a subject with their enrollment status, ordered by status then name.
	 */
	async listStudents(actor: Actor, subjectId: number, status?: EnrollmentStatus): Promise<SubjectStudentView[]> {
		await this.assertCanManageSubject(actor, subjectId);
		const enrollments = await this.relationships.findEnrollmentsBySubjects([subjectId], status);
		const users = await this.userMap(enrollments.map(enrollment => enrollment.studentId));

		return enrollments
			.map(enrollment => {
				const student = users.get(enrollment.studentId);
				return {
					studentId: enrollment.studentId,
					username: student?.username ?? null,
					fullName: student?.fullName ?? null,
					email: student?.email ?? null,
					status: enrollment.status,
					requestedAt: enrollment.requestedAt,
					approvedAt: enrollment.approvedAt,
				};
			})
			.sort((a, b) => a.status.localeCompare(b.status) || (a.fullName ?? '').localeCompare(b.fullName ?? ''));
	}

	// ==================== STUDENT ====================

	async listStudentSubjects(actor: Actor): Promise<EnrolledSubjectView[]> {
		assertRole(actor, 'student');
		const enrollments = await this.relationships.findEnrollmentsByStudent(actor.id, 'approved');
		const subjects = await this.subjectMap(enrollments.map(enrollment => enrollment.subjectId));

		return enrollments
			.flatMap(enrollment => {
				const subject = subjects.get(enrollment.subjectId);
				return subject
					? [{ subjectId: subject.id, name: subject.name, description: subject.description, approvedAt: enrollment.approvedAt }]
					: [];
			})
			.sort((a, b) => a.name.localeCompare(b.name));
	}

	async listStudentRequests(actor: Actor): Promise<EnrollmentView[]> {
		assertRole(actor, 'student');
		const enrollments = await this.relationships.findEnrollmentsByStudent(actor.id);
		return this.toEnrollmentViews(enrollments);
	}

	/**
	 * The subject catalogue annotated with the student's own enrollment status.
	 */
	async listAvailableSubjects(actor: Actor): Promise<AvailableSubjectView[]> {
		assertRole(actor, 'student');
		const subjects = await this.subjectsService.list();
		const enrollments = await this.relationships.findEnrollmentsByStudent(actor.id);
		const statusBySubject = new Map(enrollments.map(enrollment => [enrollment.subjectId, enrollment.status]));

		return subjects.map(subject => ({
			subjectId: subject.id,
			name: subject.name,
			description: subject.description,
			enrollmentStatus: statusBySubject.get(subject.id) ?? null,
		}));
	}

	// ==================== ADMIN ====================

	async listSubjectTeachers(actor: Actor, subjectId: number): Promise<InvitationView[]> {
		assertRole(actor, 'admin');
		await this.subjectsService.getById(subjectId);
		const invitations = await this.relationships.findInvitationsBySubject(subjectId);
		return this.toInvitationViews(invitations);
	}

	async listAllInvitations(actor: Actor): Promise<InvitationView[]> {
		assertRole(actor, 'admin');
		return this.toInvitationViews(await this.relationships.findAllInvitations());
	}

	async listAllEnrollments(actor: Actor): Promise<EnrollmentView[]> {
		assertRole(actor, 'admin');
		return this.toEnrollmentViews(await this.relationships.findAllEnrollments());
	}

	// ==================== GATES ====================

	/**
	 * Whether the actor may read the subject's content (quizzes, weaknesses).
	 */
	async canAccessSubject(actor: Actor, subjectId: number): Promise<boolean> {
		switch (actor.role) {
			case 'admin':
				return true;
			case 'teacher':
				return this.relationships.hasAcceptedInvitation(actor.id, subjectId);
			case 'student':
				return this.relationships.isEnrolled(actor.id, subjectId);
		}
	}

	async canManageSubject(actor: Actor, subjectId: number): Promise<boolean> {
		if (actor.role === 'admin') {
			return true;
		}
		if (actor.role !== 'teacher') {
			return false;
		}
		return this.relationships.hasAcceptedInvitation(actor.id, subjectId);
	}

	async assertCanAccessSubject(actor: Actor, subjectId: number): Promise<void> {
		if (!await this.canAccessSubject(actor, subjectId)) {
			throw new PermissionDeniedException(
				actor.role === 'student'
					? 'You must be enrolled in this subject'
					: 'You are not assigned to this subject',
			);
		}
	}

	async assertCanManageSubject(actor: Actor, subjectId: number): Promise<void> {
		if (!await this.canManageSubject(actor, subjectId)) {
			throw new PermissionDeniedException('You are not assigned to this subject');
		}
	}

	// ==================== HELPERS ====================

	private async toInvitationViews(invitations: SubjectTeacher[]): Promise<InvitationView[]> {
		const subjects = await this.subjectMap(invitations.map(invitation => invitation.subjectId));
		const users = await this.userMap(invitations.map(invitation => invitation.teacherId));

		return invitations.map(invitation => ({
			subjectId: invitation.subjectId,
			subjectName: subjects.get(invitation.subjectId)?.name ?? '',
			teacherId: invitation.teacherId,
			teacherUsername: users.get(invitation.teacherId)?.username ?? null,
			teacherFullName: users.get(invitation.teacherId)?.fullName ?? null,
			status: invitation.status,
			invitedAt: invitation.invitedAt,
			acceptedAt: invitation.acceptedAt,
		}));
	}

	private async toEnrollmentViews(enrollments: StudentSubject[]): Promise<EnrollmentView[]> {
		const subjects = await this.subjectMap(enrollments.map(enrollment => enrollment.subjectId));
		const users = await this.userMap(enrollments.map(enrollment => enrollment.studentId));

		return enrollments.map(enrollment => ({
			subjectId: enrollment.subjectId,
			subjectName: subjects.get(enrollment.subjectId)?.name ?? '',
			studentId: enrollment.studentId,
			studentUsername: users.get(enrollment.studentId)?.username ?? null,
			studentFullName: users.get(enrollment.studentId)?.fullName ?? null,
			status: enrollment.status,
			requestedAt: enrollment.requestedAt,
			approvedAt: enrollment.approvedAt,
		}));
	}

	private async subjectMap(ids: number[]): Promise<Map<number, Subject>> {
		const subjects = await this.subjectsService.findByIds(unique(ids));
		return new Map(subjects.map(subject => [subject.id, subject]));
	}

	private async userMap(ids: number[]): Promise<Map<number, User>> {
		const users = await this.usersService.findByIds(unique(ids));
		return new Map(users.map(user => [user.id, user]));
	}
}

function unique(ids: number[]): number[] {
	return Array.from(new Set(ids));
}
