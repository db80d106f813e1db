import { IsNotEmpty, IsNotEmptyObject, IsObject, IsString } from 'class-validator';

export class QuestionRecordDto {
  @IsString()
  @IsNotEmpty()
  question!: string;

  @IsObject()
  @IsNotEmptyObject()
  options!: Record<string, unknown>;
}
