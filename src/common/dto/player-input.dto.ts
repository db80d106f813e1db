import { Transform, TransformFnParams } from 'class-transformer';
import { IsIn, IsString, Length, Matches } from 'class-validator';
import {
  GAME_CONFIG,
  OptionLabel,
} from '../constants/game.constants';

const trimmed = ({ value }: TransformFnParams): unknown =>
  typeof value === 'string' ? value.trim() : value;

export class PlayerNameDto {
  @Transform(trimmed)
  @IsString()
  @Length(
    GAME_CONFIG.MIN_PLAYER_NAME_LENGTH,
    GAME_CONFIG.MAX_PLAYER_NAME_LENGTH,
    {
      message: `Name must be between ${GAME_CONFIG.MIN_PLAYER_NAME_LENGTH} and ${GAME_CONFIG.MAX_PLAYER_NAME_LENGTH} characters long.`,
    },
  )
  @Matches(GAME_CONFIG.PLAYER_NAME_PATTERN, {
    message:
      'Name can only contain letters, numbers, spaces and these characters: _ - .',
  })
  name!: string;
}

export class AnswerDto {
  @Transform(({ value }: TransformFnParams): unknown =>
    typeof value === 'string' ? value.trim().toUpperCase() : value,
  )
  @IsIn(GAME_CONFIG.OPTION_LABELS, {
    message: `Please enter a valid answer (${GAME_CONFIG.OPTION_LABELS.join(', ')}).`,
  })
  answer!: OptionLabel;
}
