import {
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsPositive,
  IsString,
} from 'class-validator';
import type { SponsorOfferInput } from '../../access.types';

export class SponsorOfferFields implements SponsorOfferInput {
  @IsString()
  @IsNotEmpty()
  profileId!: string;

  @IsNumber({ allowNaN: false, allowInfinity: false })
  @IsPositive({ message: 'amount must be greater than zero' })
  amount!: number;

  // The only nullable column in the model.
  @IsOptional()
  @IsString()
  description?: string | null;
}
