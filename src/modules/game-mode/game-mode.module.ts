import { Module } from '@nestjs/common';
import { GameModeService } from './game-mode.service';

@Module({
  providers: [GameModeService],
  exports: [GameModeService],
})
export class GameModeModule {}
