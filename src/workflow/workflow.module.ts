import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { SubjectTeacher } from './subject-teacher.entity';
import { StudentSubject } from './student-subject.entity';
import { RelationshipsService } from './relationships.service';
import { WorkflowService } from './workflow.service';
import { AccessService } from './access.service';
import { WorkflowController } from './workflow.controller';
import { NotificationsModule } from '../notifications/notifications.module';
import { SubjectsModule } from '../subjects/subjects.module';
import { UsersModule } from '../users/users.module';

@Module({
	imports: [
		TypeOrmModule.forFeature([SubjectTeacher, StudentSubject]),
		NotificationsModule,
		SubjectsModule,
		UsersModule,
	],
	providers: [RelationshipsService, WorkflowService, AccessService],
	controllers: [WorkflowController],
	exports: [AccessService, RelationshipsService],
})
export class WorkflowModule { }
