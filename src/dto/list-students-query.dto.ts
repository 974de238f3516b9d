import { IsIn, IsOptional } from 'class-validator';
import { ENROLLMENT_STATUSES, EnrollmentStatus } from '../workflow/student-subject.entity';

export class ListStudentsQueryDto {
  @IsOptional()
  @IsIn(ENROLLMENT_STATUSES)
  status?: EnrollmentStatus;
}
