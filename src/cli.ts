#!/usr/bin/env node
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { parseArgs } from './cli-args';
import { RouterService } from './router/router.service';

const USAGE = 'Usage: assistant-route "your request here" [--account EMAIL] [--calendly-key KEY] [--json]';

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (!args) {
    console.error(USAGE);
    process.exitCode = 2;
    return;
  }

  const app = await NestFactory.createApplicationContext(AppModule, { logger: ['error', 'warn'] });
  try {
    const response = await app.get(RouterService).route(args.text, {
      accountEmail: args.accountEmail,
      calendlyKey: args.calendlyKey,
    });
    console.log(args.json ? JSON.stringify(response, null, 2) : response.text);
    process.exitCode = response.ok ? 0 : 1;
  } finally {
    await app.close();
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    new Logger('Cli').error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });
}
