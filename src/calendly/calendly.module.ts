import { Module } from '@nestjs/common';
import { SCHEDULING_PROVIDER } from '../common/collaborators';
import { DateWindowModule } from '../date-window/date-window.module';
import { CalendlyController } from './calendly.controller';
import { CalendlyService } from './calendly.service';

@Module({
  imports: [DateWindowModule],
  providers: [CalendlyService, { provide: SCHEDULING_PROVIDER, useExisting: CalendlyService }],
  controllers: [CalendlyController],
  exports: [SCHEDULING_PROVIDER],
})
export class CalendlyModule {}
