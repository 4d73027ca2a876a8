import { Module } from '@nestjs/common';
import { DispatchModule } from '../dispatch/dispatch.module';
import { IntentModule } from '../intent/intent.module';
import { RouterController } from './router.controller';
import { RouterService } from './router.service';

@Module({
  imports: [IntentModule, DispatchModule],
  controllers: [RouterController],
  providers: [RouterService],
  exports: [RouterService],
})
export class RouterModule {}
