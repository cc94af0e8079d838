import { IsNotEmpty, IsOptional, IsString } from 'class-validator';

export class ListEventsQueryDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  organizerId?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  type?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  city?: string;
}
