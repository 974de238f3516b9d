import { IsString, IsNotEmpty, IsOptional, IsEmail, IsIn, MaxLength, Matches } from 'class-validator';
import { USER_ROLES, UserRole } from '../auth/actor';

export class CreateUserDto {
  @IsString()
  @IsNotEmpty({ message: 'Username is required' })
  @MaxLength(50)
  @Matches(/^[a-zA-Z0-9_.-]+$/, { message: 'Username may contain letters, digits, dot, dash and underscore only' })
  username!: string;

  @IsIn(USER_ROLES)
  role!: UserRole;

  @IsOptional()
  @IsEmail()
  @MaxLength(255)
  email?: string;

  @IsOptional()
  @IsString()
  @MaxLength(255)
  fullName?: string;
}
