import { Module } from '@nestjs/common';
import { GameService } from './game.service';
import { GameModeModule } from '../game-mode/game-mode.module';
import { LeaderboardModule } from '../leaderboard/leaderboard.module';
import { ProgressModule } from '../progress/progress.module';
import { QuestionModule } from '../question/question.module';

@Module({
  imports: [QuestionModule, ProgressModule, LeaderboardModule, GameModeModule],
  providers: [GameService],
  exports: [GameService],
})
export class GameModule {}
