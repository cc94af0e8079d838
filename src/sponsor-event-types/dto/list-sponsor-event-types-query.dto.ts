import { IsNotEmpty, IsOptional, IsString } from 'class-validator';

export class ListSponsorEventTypesQueryDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  sponsorOfferId?: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  eventType?: string;
}
