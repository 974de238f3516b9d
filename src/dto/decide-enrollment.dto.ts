import { IsBoolean } from 'class-validator';

export class DecideEnrollmentDto {
  @IsBoolean()
  approve!: boolean;
}
