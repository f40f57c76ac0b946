import { Controller, Get, UseFilters } from '@nestjs/common';
import { QueryExceptionFilter } from '../query/query-exception.filter';
import { SchemaInfo, SchemaService } from './schema.service';

@Controller('api')
@UseFilters(QueryExceptionFilter)
export class SchemaController {
  constructor(private readonly schemaService: SchemaService) {}

  @Get('schema-info')
  schemaInfo(): Promise<SchemaInfo> {
    return this.schemaService.describe();
  }
}
