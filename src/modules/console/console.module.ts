import { Module } from '@nestjs/common';
import { ConsoleService } from './console.service';
import { TriviaCli } from './trivia.cli';
import { GameModule } from '../game/game.module';
import { GameModeModule } from '../game-mode/game-mode.module';
import { LeaderboardModule } from '../leaderboard/leaderboard.module';
import { ProgressModule } from '../progress/progress.module';

@Module({
  imports: [GameModule, GameModeModule, LeaderboardModule, ProgressModule],
  providers: [ConsoleService, TriviaCli],
  exports: [ConsoleService, TriviaCli],
})
export class ConsoleModule {}
