import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ConsoleModule } from './modules/console/console.module';
import { GameModule } from './modules/game/game.module';
import { GameModeModule } from './modules/game-mode/game-mode.module';
import { LeaderboardModule } from './modules/leaderboard/leaderboard.module';
import { PersistenceModule } from './modules/persistence/persistence.module';
import { ProgressModule } from './modules/progress/progress.module';
import { QuestionModule } from './modules/question/question.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
    }),
    GameModeModule,
    QuestionModule,
    PersistenceModule,
    LeaderboardModule,
    ProgressModule,
    GameModule,
    ConsoleModule,
  ],
})
export class AppModule {}
