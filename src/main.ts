#!/usr/bin/env node
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { AppModule } from './app.module';
import { GameInterruptedError } from './common/errors/trivia.errors';
import { logLevelsFor } from './common/utils/config.util';
import { errorMessage } from './common/utils/error.util';
import { ConsoleService } from './modules/console/console.service';
import { TriviaCli } from './modules/console/trivia.cli';
import { LeaderboardService } from './modules/leaderboard/leaderboard.service';

async function bootstrap() {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: logLevelsFor(process.env.LOG_LEVEL),
    abortOnError: false,
  });

  const consoleService = app.get(ConsoleService);
  const cli = app.get(TriviaCli);
  const leaderboard = app.get(LeaderboardService);

  process.on('SIGINT', () => consoleService.interrupt());

  try {
    await cli.run();
  } catch (error) {
    if (error instanceof GameInterruptedError) {
      consoleService.print('', 'Game ended by user.');
    } else {
      logger.error(`Unexpected error: ${errorMessage(error)}`);
      process.exitCode = 1;
    }
  } finally {
    try {
      await leaderboard.flush();
    } catch (error) {
      logger.error(`Could not save leaderboard: ${errorMessage(error)}`);
      process.exitCode = 1;
    }
    await app.close();
  }
}

if (require.main === module) {
  bootstrap().catch((error: unknown) => {
    new Logger('Bootstrap').error(errorMessage(error));
    process.exitCode = 1;
  });
}
