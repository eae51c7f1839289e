#!/usr/bin/env node
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { formatErrorMessage } from './common/errors';
import { ExtractionService } from './extraction/extraction.service';

async function bootstrap(): Promise<void> {
  const logger = new Logger('Extractor');
  const app = await NestFactory.createApplicationContext(AppModule, {
    abortOnError: false,
  });

  try {
    const report = await app.get(ExtractionService).run();

    for (const { category, succeeded, failed } of report.categories) {
      logger.log(`${category}: ${succeeded} row(s), ${failed} failed`);
    }
    if (report.invalid.length > 0) {
      logger.warn(`${report.invalid.length} input row(s) skipped as invalid`);
    }
    logger.log(
      `Done in ${report.durationMs}ms. Files written: ${report.files.join(', ') || 'none'}`,
    );
  } finally {
    await app.close();
  }
}

bootstrap().catch((error: unknown) => {
  new Logger('Extractor').error(formatErrorMessage(error));
  process.exitCode = 1;
});
