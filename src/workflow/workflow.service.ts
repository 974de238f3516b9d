import { Injectable, Logger } from '@nestjs/common';
import { RelationshipsService, EnrollmentChanges, InvitationChanges } from './relationships.service';
import { SubjectTeacher } from './subject-teacher.entity';
import { StudentSubject, ACTIVE_ENROLLMENT_STATUSES } from './student-subject.entity';
import { NotificationsService } from '../notifications/notifications.service';
import { NotificationType } from '../notifications/notification.entity';
import { SubjectsService } from '../subjects/subjects.service';
import { UsersService } from '../users/users.service';
import { User } from '../users/user.entity';
import { Actor, assertRole } from '../auth/actor';
import {
	PermissionDeniedException,
	RecordNotFoundException,
	StateConflictException,
	ValidationException,
} from '../common/exceptions';

/**
 * State transitions of teacher invitations and student enrollments.
 *
 * Each operation checks the actor's role first, then the current state of the
 * targeted row, writes the new state with one conditional statement and only
 * then appends notifications. A failed notification is logged and does not
 * undo the transition.
 */
@Injectable()
export class WorkflowService {
	private readonly logger = new Logger(WorkflowService.name);

	constructor(
		private readonly relationships: RelationshipsService,
		private readonly notifications: NotificationsService,
		private readonly subjectsService: SubjectsService,
		private readonly usersService: UsersService,
	) { }

	// ==================== INVITATIONS ====================

	async inviteTeacher(actor: Actor, subjectId: number, teacherId: number): Promise<SubjectTeacher> {
		assertRole(actor, 'admin');

		const subject = await this.subjectsService.getById(subjectId);
		const teacher = await this.usersService.getById(teacherId);
		if (teacher.role !== 'teacher') {
			throw new ValidationException(`User ${teacherId} is not a teacher`);
		}
		if (!teacher.isActive) {
			throw new ValidationException(`Teacher ${teacherId} is deactivated`);
		}

		const existing = await this.relationships.findInvitation(subjectId, teacherId);
		let invitation: SubjectTeacher;

		if (existing) {
			if (existing.status === 'pending') {
				throw new StateConflictException('Teacher already invited to this subject');
			}
			if (existing.status === 'accepted') {
				throw new StateConflictException('Teacher already manages this subject');
			}

			// a rejected invitation can be sent again
			const changes: InvitationChanges = {
				status: 'pending',
				invitedBy: actor.id,
				invitedAt: new Date(),
				acceptedAt: null,
				respondedAt: null,
			};
			const reopened = await this.relationships.transitionInvitation(subjectId, teacherId, ['rejected'], changes);
			if (!reopened) {
				throw new StateConflictException('Invitation was changed by another request');
			}
			invitation = Object.assign(existing, changes);
		} else {
			invitation = await this.relationships.createInvitation(subjectId, teacherId, actor.id);
		}

		this.logger.log(`Admin ${actor.id} invited teacher ${teacherId} to subject ${subjectId}`);

		await this.notify(
			teacherId,
			`Subject Invitation: ${subject.name}`,
			`You have been invited to manage the subject '${subject.name}'. Please check your invitations.`,
			'info',
		);

		return invitation;
	}

	async respondToInvitation(actor: Actor, subjectId: number, accept: boolean): Promise<SubjectTeacher> {
		assertRole(actor, 'teacher');

		const invitation = await this.relationships.findInvitation(subjectId, actor.id);
		if (!invitation || invitation.status !== 'pending') {
			throw new RecordNotFoundException('No pending invitation found');
		}

		const subject = await this.subjectsService.getById(subjectId);
		const teacher = await this.usersService.findById(actor.id);
		const adminIds = await this.invitationAudience(invitation);

		const now = new Date();
		const changes: InvitationChanges = accept
			? { status: 'accepted', acceptedAt: now, respondedAt: now }
			: { status: 'rejected', respondedAt: now };

		const updated = await this.relationships.transitionInvitation(subjectId, actor.id, ['pending'], changes);
		if (!updated) {
			throw new RecordNotFoundException('No pending invitation found');
		}
		Object.assign(invitation, changes);

		this.logger.log(`Teacher ${actor.id} ${accept ? 'accepted' : 'rejected'} invitation to subject ${subjectId}`);

		const title = accept ? `Invitation Accepted: ${subject.name}` : `Invitation Rejected: ${subject.name}`;
		const message = `Teacher ${displayName(teacher, actor.id)} has ${accept ? 'accepted' : 'rejected'} the invitation to manage ${subject.name}.`;
		for (const adminId of adminIds) {
			await this.notify(adminId, title, message, 'info');
		}

		return invitation;
	}

	/**
	 * Takes the teacher off a subject regardless of the invitation state.
	 */
	async removeTeacher(actor: Actor, subjectId: number, teacherId: number): Promise<void> {
		assertRole(actor, 'admin');

		const subject = await this.subjectsService.getById(subjectId);
		const removed = await this.relationships.deleteInvitation(subjectId, teacherId);
		if (!removed) {
			throw new RecordNotFoundException('Teacher is not assigned to this subject');
		}

		this.logger.log(`Admin ${actor.id} removed teacher ${teacherId} from subject ${subjectId}`);

		await this.notify(
			teacherId,
			`Removed from Subject: ${subject.name}`,
			`You are no longer assigned to manage ${subject.name}.`,
			'warning',
		);
	}

	// ==================== ENROLLMENTS ====================

	async requestEnrollment(actor: Actor, subjectId: number): Promise<StudentSubject> {
		assertRole(actor, 'student');

		const subject = await this.subjectsService.getById(subjectId);
		const student = await this.usersService.findById(actor.id);

		const teacherIds = await this.relationships.acceptedTeacherIds(subjectId);

		const existing = await this.relationships.findEnrollment(actor.id, subjectId);
		let enrollment: StudentSubject;

		if (existing) {
			if (existing.status === 'pending') {
				throw new StateConflictException('Enrollment request already pending');
			}
			if (existing.status === 'approved') {
				throw new StateConflictException('Already enrolled in this subject');
			}

			// rejected or withdrawn: the same row starts a new lifecycle
			const changes: EnrollmentChanges = {
				status: 'pending',
				requestedAt: new Date(),
				approvedAt: null,
				decidedBy: null,
				withdrawnAt: null,
			};
			const reopened = await this.relationships.transitionEnrollment(actor.id, subjectId, ['rejected', 'withdrawn'], changes);
			if (!reopened) {
				throw new StateConflictException('Enrollment was changed by another request');
			}
			enrollment = Object.assign(existing, changes);
		} else {
			enrollment = await this.relationships.createEnrollment(actor.id, subjectId);
		}

		this.logger.log(`Student ${actor.id} requested enrollment in subject ${subjectId}`);

		const name = displayName(student, actor.id);
		const username = student ? ` (${student.username})` : '';
		for (const teacherId of teacherIds) {
			await this.notify(
				teacherId,
				`New Enrollment Request: ${subject.name}`,
				`Student ${name}${username} has requested to enroll in ${subject.name}.`,
				'info',
			);
		}

		return enrollment;
	}

	async decideEnrollment(actor: Actor, studentId: number, subjectId: number, approve: boolean): Promise<StudentSubject> {
		assertRole(actor, 'teacher');

		if (!await this.relationships.hasAcceptedInvitation(actor.id, subjectId)) {
			throw new PermissionDeniedException('You are not assigned to this subject');
		}

		const enrollment = await this.relationships.findEnrollment(studentId, subjectId);
		if (!enrollment || enrollment.status !== 'pending') {
			throw new RecordNotFoundException('No pending enrollment request found');
		}

		const subject = await this.subjectsService.getById(subjectId);

		const changes: EnrollmentChanges = approve
			? { status: 'approved', approvedAt: new Date(), decidedBy: actor.id }
			: { status: 'rejected', decidedBy: actor.id };

		const updated = await this.relationships.transitionEnrollment(studentId, subjectId, ['pending'], changes);
		if (!updated) {
			throw new RecordNotFoundException('No pending enrollment request found');
		}
		Object.assign(enrollment, changes);

		this.logger.log(`Teacher ${actor.id} ${approve ? 'approved' : 'rejected'} student ${studentId} in subject ${subjectId}`);

		if (approve) {
			await this.notify(
				studentId,
				`Enrollment Approved: ${subject.name}`,
				`Your enrollment request for ${subject.name} has been approved.`,
				'success',
			);
		} else {
			await this.notify(
				studentId,
				`Enrollment Rejected: ${subject.name}`,
				`Your enrollment request for ${subject.name} has been rejected.`,
				'error',
			);
		}

		return enrollment;
	}

	async withdrawEnrollment(actor: Actor, subjectId: number): Promise<StudentSubject> {
		assertRole(actor, 'student');

		const enrollment = await this.relationships.findEnrollment(actor.id, subjectId);
		if (!enrollment || !ACTIVE_ENROLLMENT_STATUSES.includes(enrollment.status)) {
			throw new RecordNotFoundException('No active enrollment found for this subject');
		}

		const changes: EnrollmentChanges = { status: 'withdrawn', withdrawnAt: new Date() };
		const updated = await this.relationships.transitionEnrollment(actor.id, subjectId, ACTIVE_ENROLLMENT_STATUSES, changes);
		if (!updated) {
			throw new RecordNotFoundException('No active enrollment found for this subject');
		}

		this.logger.log(`Student ${actor.id} withdrew from subject ${subjectId}`);
		return Object.assign(enrollment, changes);
	}

	// ==================== HELPERS ====================

	/**
	 * The admin who sent the invitation; every active admin when that account is gone.
	 */
	private async invitationAudience(invitation: SubjectTeacher): Promise<number[]> {
		if (invitation.invitedBy !== null) {
			const inviter = await this.usersService.findById(invitation.invitedBy);
			if (inviter && inviter.isActive) {
				return [inviter.id];
			}
		}
		const admins = await this.usersService.findActiveByRole('admin');
		return admins.map(admin => admin.id);
	}

	private async notify(recipientId: number, title: string, message: string, type: NotificationType): Promise<void> {
		try {
			await this.notifications.emit(recipientId, title, message, type);
		} catch (error) {
			this.logger.error(
				`Failed to notify user ${recipientId} ("${title}")`,
				error instanceof Error ? error.stack : String(error),
			);
		}
	}
}

function displayName(user: User | null, fallbackId: number): string {
	return user?.fullName || user?.username || `#${fallbackId}`;
}
