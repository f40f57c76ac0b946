import { Global, Module } from '@nestjs/common';
import { APP_CONFIG, AppConfig } from '../config';
import { DB_CONNECTION_FACTORY, pgConnectionFactory } from './index';

@Global()
@Module({
  providers: [
    {
      provide: DB_CONNECTION_FACTORY,
      inject: [APP_CONFIG],
      useFactory: (config: AppConfig) => pgConnectionFactory(config.database),
    },
  ],
  exports: [DB_CONNECTION_FACTORY],
})
export class DbModule {}
