import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import extractorConfig from './config/extractor.config';
import { ExtractionModule } from './extraction/extraction.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [extractorConfig],
    }),
    ExtractionModule,
  ],
})
export class AppModule {}
