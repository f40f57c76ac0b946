import { DynamicModule, Module } from '@nestjs/common';
import { AppConfig, ConfigModule } from './config';
import { DbModule } from './db/db.module';
import { QueryModule } from './query/query.module';
import { SchemaModule } from './schema/schema.module';

@Module({})
export class AppModule {
  static forRoot(config: AppConfig): DynamicModule {
    return {
      module: AppModule,
      imports: [ConfigModule.forRoot(config), DbModule, QueryModule, SchemaModule],
    };
  }
}
