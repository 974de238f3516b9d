import { Body, Controller, Delete, Get, HttpCode, Logger, Param, ParseIntPipe, Post, Query } from '@nestjs/common';
import { WorkflowService } from './workflow.service';
import { AccessService } from './access.service';
import { CurrentActor } from '../auth/current-actor.decorator';
import { Actor } from '../auth/actor';
import { InviteTeacherDto } from '../dto/invite-teacher.dto';
import { RespondInvitationDto } from '../dto/respond-invitation.dto';
import { DecideEnrollmentDto } from '../dto/decide-enrollment.dto';
import { ListStudentsQueryDto } from '../dto/list-students-query.dto';

@Controller()
export class WorkflowController {
	private readonly logger = new Logger(WorkflowController.name);

	constructor(
		private readonly workflowService: WorkflowService,
		private readonly accessService: AccessService,
	) { }

	// ==================== INVITATIONS ====================

	@Post('subjects/:subjectId/invitations')
	async inviteTeacher(
		@CurrentActor() actor: Actor,
		@Param('subjectId', ParseIntPipe) subjectId: number,
		@Body() dto: InviteTeacherDto,
	) {
		this.logger.log(`[POST] /subjects/${subjectId}/invitations teacher=${dto.teacherId}`);
		return this.workflowService.inviteTeacher(actor, subjectId, dto.teacherId);
	}

	@Delete('subjects/:subjectId/teachers/:teacherId')
	@HttpCode(204)
	async removeTeacher(
		@CurrentActor() actor: Actor,
		@Param('subjectId', ParseIntPipe) subjectId: number,
		@Param('teacherId', ParseIntPipe) teacherId: number,
	): Promise<void> {
		await this.workflowService.removeTeacher(actor, subjectId, teacherId);
	}

	@Post('invitations/:subjectId/respond')
	@HttpCode(200)
	async respondToInvitation(
		@CurrentActor() actor: Actor,
		@Param('subjectId', ParseIntPipe) subjectId: number,
		@Body() dto: RespondInvitationDto,
	) {
		this.logger.log(`[POST] /invitations/${subjectId}/respond accept=${dto.accept}`);
		return this.workflowService.respondToInvitation(actor, subjectId, dto.accept);
	}

	@Get('invitations')
	async listAllInvitations(@CurrentActor() actor: Actor) {
		return this.accessService.listAllInvitations(actor);
	}

	@Get('subjects/:subjectId/teachers')
	async listSubjectTeachers(@CurrentActor() actor: Actor, @Param('subjectId', ParseIntPipe) subjectId: number) {
		return this.accessService.listSubjectTeachers(actor, subjectId);
	}

	// ==================== ENROLLMENTS ====================

	@Post('subjects/:subjectId/enrollments')
	async requestEnrollment(@CurrentActor() actor: Actor, @Param('subjectId', ParseIntPipe) subjectId: number) {
		this.logger.log(`[POST] /subjects/${subjectId}/enrollments by student ${actor.id}`);
		return this.workflowService.requestEnrollment(actor, subjectId);
	}

	@Post('subjects/:subjectId/enrollments/withdraw')
	@HttpCode(200)
	async withdrawEnrollment(@CurrentActor() actor: Actor, @Param('subjectId', ParseIntPipe) subjectId: number) {
		return this.workflowService.withdrawEnrollment(actor, subjectId);
	}

	@Post('subjects/:subjectId/enrollments/:studentId/decision')
	@HttpCode(200)
	async decideEnrollment(
		@CurrentActor() actor: Actor,
		@Param('subjectId', ParseIntPipe) subjectId: number,
		@Param('studentId', ParseIntPipe) studentId: number,
		@Body() dto: DecideEnrollmentDto,
	) {
		this.logger.log(`[POST] /subjects/${subjectId}/enrollments/${studentId}/decision approve=${dto.approve}`);
		return this.workflowService.decideEnrollment(actor, studentId, subjectId, dto.approve);
	}

	@Get('enrollments')
	async listAllEnrollments(@CurrentActor() actor: Actor) {
		return this.accessService.listAllEnrollments(actor);
	}

	@Get('subjects/:subjectId/students')
	async listStudents(
		@CurrentActor() actor: Actor,
		@Param('subjectId', ParseIntPipe) subjectId: number,
		@Query() query: ListStudentsQueryDto,
	) {
		return this.accessService.listStudents(actor, subjectId, query.status);
	}

	// ==================== CURRENT USER ====================

	@Get('me/subjects')
	async mySubjects(@CurrentActor() actor: Actor) {
		if (actor.role === 'teacher') {
			return this.accessService.listTeacherSubjects(actor);
		}
		return this.accessService.listStudentSubjects(actor);
	}

	@Get('me/invitations')
	async myInvitations(@CurrentActor() actor: Actor) {
		return this.accessService.listPendingInvitations(actor);
	}

	@Get('me/pending-requests')
	async myPendingRequests(@CurrentActor() actor: Actor) {
		return this.accessService.listPendingRequests(actor);
	}

	@Get('me/enrollment-requests')
	async myEnrollmentRequests(@CurrentActor() actor: Actor) {
		return this.accessService.listStudentRequests(actor);
	}

	@Get('me/available-subjects')
	async availableSubjects(@CurrentActor() actor: Actor) {
		return this.accessService.listAvailableSubjects(actor);
	}
}
