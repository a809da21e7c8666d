import { ApiToken } from '../auth/api-token.entity';
import { Booking } from '../bookings/booking.entity';
import { Building } from '../buildings/building.entity';
import { Course } from '../courses/course.entity';
import { EnrolledStudent } from '../enrolled-students/enrolled-student.entity';
import { EventLog } from '../event-log/event-log.entity';
import { Machine } from '../machines/machine.entity';
import { ReminderLog } from '../reminders/reminder-log.entity';
import { User } from '../users/user.entity';

export const ENTITIES = [
  Building,
  Course,
  EnrolledStudent,
  User,
  Machine,
  Booking,
  ReminderLog,
  ApiToken,
  EventLog,
];
