import { Logger, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { VariableCatalog } from '../catalog/variable-catalog';
import {
  EXTRACTOR_SETTINGS,
  buildExtractorSettings,
} from '../config/extractor-settings';
import { EXTRACTOR_CONFIG_NAMESPACE } from '../config/extractor.config';
import { ResultWriterService } from '../output/result-writer.service';
import { MeteoblueClient } from '../transport/meteoblue.client';
import { CsvTrialReader } from '../trials/readers/csv-trial.reader';
import { ExcelTrialReader } from '../trials/readers/excel-trial.reader';
import { TrialLoaderService } from '../trials/trial-loader.service';
import { ExtractionService } from './extraction.service';

/**
 * ExtractionModule
 *
 * Components:
 * - EXTRACTOR_SETTINGS: validated configuration, built once from ConfigService
 * - VariableCatalog: bundled code -> variable/unit table
 * - TrialLoaderService + readers: input table (CSV, Excel)
 * - MeteoblueClient: dataset API transport
 * - ResultWriterService: output tables
 * - ExtractionService: orchestrates a run
 */
@Module({
  providers: [
    {
      provide: EXTRACTOR_SETTINGS,
      useFactory: (configService: ConfigService) => {
        const logger = new Logger('ExtractorSettings');
        return buildExtractorSettings(
          configService.get<unknown>(EXTRACTOR_CONFIG_NAMESPACE),
          (message) => logger.warn(message),
        );
      },
      inject: [ConfigService],
    },
    {
      provide: VariableCatalog,
      useFactory: () => VariableCatalog.bundled(),
    },
    CsvTrialReader,
    ExcelTrialReader,
    TrialLoaderService,
    MeteoblueClient,
    ResultWriterService,
    ExtractionService,
  ],
  exports: [ExtractionService],
})
export class ExtractionModule {}
