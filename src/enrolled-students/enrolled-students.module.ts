import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { EnrolledStudent } from './enrolled-student.entity';
import { EnrolledStudentsService } from './enrolled-students.service';

@Module({
  imports: [TypeOrmModule.forFeature([EnrolledStudent])],
  providers: [EnrolledStudentsService],
  exports: [EnrolledStudentsService],
})
export class EnrolledStudentsModule {}
