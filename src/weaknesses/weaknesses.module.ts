import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Weakness } from './weakness.entity';
import { WeaknessesService } from './weaknesses.service';
import { WeaknessesController } from './weaknesses.controller';
import { WorkflowModule } from '../workflow/workflow.module';
import { UsersModule } from '../users/users.module';

@Module({
  imports: [TypeOrmModule.forFeature([Weakness]), WorkflowModule, UsersModule],
  providers: [WeaknessesService],
  controllers: [WeaknessesController],
  exports: [WeaknessesService],
})
export class WeaknessesModule {}
