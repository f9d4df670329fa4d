import { IsOptional, IsString, MaxLength } from 'class-validator';

export class ListSongsQueryDto {
  @IsOptional()
  @IsString()
  @MaxLength(32)
  status?: string;

  @IsOptional()
  @IsString()
  @MaxLength(200)
  title?: string;
}
