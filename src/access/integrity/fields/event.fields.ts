import {
  IsISO8601,
  IsNotEmpty,
  IsNumber,
  IsPositive,
  IsString,
  Matches,
} from 'class-validator';
import type { EventInput } from '../../access.types';

export class EventFields implements EventInput {
  @IsString()
  @IsNotEmpty()
  name!: string;

  @IsString()
  @IsNotEmpty()
  type!: string;

  @IsNumber({ allowNaN: false, allowInfinity: false })
  @IsPositive({ message: 'amount must be greater than zero' })
  amount!: number;

  @IsString()
  @IsNotEmpty()
  city!: string;

  @IsString()
  @IsNotEmpty()
  description!: string;

  @Matches(/^\d{4}-\d{2}-\d{2}$/, { message: 'date must be a YYYY-MM-DD date' })
  @IsISO8601({ strict: true })
  date!: string;

  @IsString()
  @IsNotEmpty()
  organizerId!: string;
}
