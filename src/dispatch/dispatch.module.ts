import { Module } from '@nestjs/common';
import { CalendlyModule } from '../calendly/calendly.module';
import { DateWindowModule } from '../date-window/date-window.module';
import { GmailModule } from '../gmail/gmail.module';
import { LlmModule } from '../llm/llm.module';
import { ActionDispatcherService } from './action-dispatcher.service';

@Module({
  imports: [DateWindowModule, GmailModule, CalendlyModule, LlmModule],
  providers: [ActionDispatcherService],
  exports: [ActionDispatcherService],
})
export class DispatchModule {}
