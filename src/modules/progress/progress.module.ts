import { Module } from '@nestjs/common';
import { ProgressService } from './progress.service';
import { LeaderboardModule } from '../leaderboard/leaderboard.module';
import { QuestionModule } from '../question/question.module';

@Module({
  imports: [QuestionModule, LeaderboardModule],
  providers: [ProgressService],
  exports: [ProgressService],
})
export class ProgressModule {}
