export interface GameMode {
  key: string;
  name: string;
  description: string;
  questionCount: number;
}
