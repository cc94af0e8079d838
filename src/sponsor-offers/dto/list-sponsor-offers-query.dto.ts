import { IsNotEmpty, IsOptional, IsString } from 'class-validator';

export class ListSponsorOffersQueryDto {
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  profileId?: string;
}
