import {
  BadRequestException,
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Post,
} from '@nestjs/common';
import { validate as isUuid } from 'uuid';
import {
  ExecuteSqlDto,
  NaturalLanguageQueryDto,
  MAX_NL_QUERY_LENGTH,
  MAX_SQL_LENGTH,
} from './dto/query.dto';
import { QueryService } from './query.service';

function requireText(value: unknown, field: string, maxLength: number): string {
  if (value === undefined || value === null) {
    throw new BadRequestException(`Body must include "${field}" (string).`);
  }
  if (typeof value !== 'string') {
    throw new BadRequestException(`"${field}" must be a string.`);
  }
  const trimmed = value.trim();
  if (!trimmed) {
    throw new BadRequestException(`"${field}" cannot be empty.`);
  }
  if (trimmed.length > maxLength) {
    throw new BadRequestException(`"${field}" must be at most ${maxLength} characters.`);
  }
  return trimmed;
}

function optionalSessionId(value: unknown): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string' || !isUuid(value)) {
    throw new BadRequestException('"sessionId" must be a UUID.');
  }
  return value;
}

@Controller()
export class QueryController {
  constructor(private readonly queryService: QueryService) {}

  @Post('generate-sql')
  @HttpCode(HttpStatus.OK)
  async generateSql(@Body() dto: NaturalLanguageQueryDto) {
    const query = requireText(dto?.query, 'query', MAX_NL_QUERY_LENGTH);
    const sessionId = optionalSessionId(dto?.sessionId);
    const candidate = await this.queryService.naturalLanguageToSql(query, sessionId);
    return { ...candidate, ...(sessionId ? { sessionId } : {}) };
  }

  @Post('execute-sql')
  @HttpCode(HttpStatus.OK)
  async executeSql(@Body() dto: ExecuteSqlDto) {
    const sql = requireText(dto?.sql, 'sql', MAX_SQL_LENGTH);
    const sessionId = optionalSessionId(dto?.sessionId);
    const result = await this.queryService.executeSql(sql, sessionId);
    return { ...result, ...(sessionId ? { sessionId } : {}) };
  }
}
