import { IsInt, Min } from 'class-validator';

export class InviteTeacherDto {
  @IsInt({ message: 'teacherId must be an integer' })
  @Min(1)
  teacherId!: number;
}
