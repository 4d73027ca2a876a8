import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { CalendlyModule } from './calendly/calendly.module';
import { routerConfig, validateEnv } from './config/router.config';
import { GmailModule } from './gmail/gmail.module';
import { RouterModule } from './router/router.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      validate: validateEnv,
      load: [routerConfig],
    }),
    RouterModule,
    GmailModule,
    CalendlyModule,
  ],
})
export class AppModule {}
