import { IsNotEmpty, IsString } from 'class-validator';
import type { SponsorEventTypeInput } from '../../access.types';

export class SponsorEventTypeFields implements SponsorEventTypeInput {
  @IsString()
  @IsNotEmpty()
  sponsorOfferId!: string;

  @IsString()
  @IsNotEmpty()
  eventType!: string;
}
