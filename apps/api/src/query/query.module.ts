import { Module } from '@nestjs/common';
import { APP_CONFIG, AppConfig } from '../config';
import { QueryExecutorService } from './executor.service';
import { QueryApiController } from './query-api.controller';
import { QueryController } from './query.controller';
import { QueryService } from './query.service';
import { OpenAiTextGenerator, TEXT_GENERATOR } from './text-generator';
import { TranslatorService } from './translator.service';

@Module({
  controllers: [QueryController, QueryApiController],
  providers: [
    {
      provide: TEXT_GENERATOR,
      inject: [APP_CONFIG],
      useFactory: (config: AppConfig) => new OpenAiTextGenerator(config.translator),
    },
    TranslatorService,
    QueryExecutorService,
    QueryService,
  ],
})
export class QueryModule {}
