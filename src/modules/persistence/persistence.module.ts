import { Module } from '@nestjs/common';
import { PersistenceService } from './persistence.service';
import { GameModeModule } from '../game-mode/game-mode.module';

@Module({
  imports: [GameModeModule],
  providers: [PersistenceService],
  exports: [PersistenceService],
})
export class PersistenceModule {}
