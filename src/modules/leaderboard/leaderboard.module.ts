import { Module } from '@nestjs/common';
import { LeaderboardService } from './leaderboard.service';
import { GameModeModule } from '../game-mode/game-mode.module';
import { PersistenceModule } from '../persistence/persistence.module';

@Module({
  imports: [GameModeModule, PersistenceModule],
  providers: [LeaderboardService],
  exports: [LeaderboardService],
})
export class LeaderboardModule {}
