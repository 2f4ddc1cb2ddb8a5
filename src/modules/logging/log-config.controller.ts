import {
  BadRequestException,
  Controller,
  Delete,
  Get,
  HttpCode,
  Param,
  Put,
  Query,
} from '@nestjs/common';

import { DirectoryLogger, type StructuredLogEntry } from './directory-logger.service';
import { LogCategory, LogLevel, isLogCategory, logLevelName, parseLogLevel } from './log-levels';

export interface LogConfigView {
  globalLevel: string;
  categoryLevels: Record<string, string>;
  includeStackTraces: boolean;
  maxPayloadSizeBytes: number;
  format: 'json' | 'pretty';
  availableLevels: string[];
  availableCategories: string[];
}

/**
 * Runtime log management without a restart.
 * Routes: /{prefix}/admin/log-config/*
 */
@Controller('admin/log-config')
export class LogConfigController {
  constructor(private readonly logger: DirectoryLogger) {}

  @Get()
  getConfig(): LogConfigView {
    const config = this.logger.getConfig();
    const categoryLevels: Record<string, string> = {};
    for (const category of Object.values(LogCategory)) {
      const level = config.categoryLevels[category];
      if (level !== undefined) {
        categoryLevels[category] = logLevelName(level);
      }
    }
    return {
      globalLevel: logLevelName(config.globalLevel),
      categoryLevels,
      includeStackTraces: config.includeStackTraces,
      maxPayloadSizeBytes: config.maxPayloadSizeBytes,
      format: config.format,
      availableLevels: Object.keys(LogLevel).filter((k) => isNaN(Number(k))),
      availableCategories: Object.values(LogCategory),
    };
  }

  /** PUT /admin/log-config/level/:level */
  @Put('level/:level')
  setGlobalLevel(@Param('level') level: string): { message: string; globalLevel: string } {
    this.logger.setGlobalLevel(level);
    const globalLevel = logLevelName(this.logger.getConfig().globalLevel);
    return { message: `Global log level set to ${globalLevel}`, globalLevel };
  }

  /** PUT /admin/log-config/category/:category/:level */
  @Put('category/:category/:level')
  setCategoryLevel(
    @Param('category') category: string,
    @Param('level') level: string,
  ): { message: string } {
    if (!isLogCategory(category)) {
      throw new BadRequestException(`Unknown log category '${category}'.`);
    }
    this.logger.setCategoryLevel(category, level);
    const applied = this.logger.getConfig().categoryLevels[category] ?? LogLevel.INFO;
    return { message: `Category '${category}' log level set to ${logLevelName(applied)}` };
  }

  /** GET /admin/log-config/recent?limit=&level=&category=&requestId= */
  @Get('recent')
  getRecentLogs(
    @Query('limit') limit?: string,
    @Query('level') level?: string,
    @Query('category') category?: string,
    @Query('requestId') requestId?: string,
  ): { count: number; entries: StructuredLogEntry[] } {
    const parsedLimit = limit ? parseInt(limit, 10) : NaN;
    const entries = this.logger.getRecentLogs({
      limit: parsedLimit > 0 ? parsedLimit : undefined,
      level: level ? parseLogLevel(level) : undefined,
      category: category && isLogCategory(category) ? category : undefined,
      requestId: requestId || undefined,
    });
    return { count: entries.length, entries };
  }

  @Delete('recent')
  @HttpCode(204)
  clearRecentLogs(): void {
    this.logger.clearRecentLogs();
  }
}
