import { IsNotEmpty, IsString } from 'class-validator';

export class BatchOptionsDto {
  @IsString()
  @IsNotEmpty()
  input!: string;

  @IsString()
  @IsNotEmpty()
  output!: string;
}
