import { Module } from '@nestjs/common';
import { DateWindowResolver } from './date-window.resolver';

@Module({
  providers: [DateWindowResolver],
  exports: [DateWindowResolver],
})
export class DateWindowModule {}
