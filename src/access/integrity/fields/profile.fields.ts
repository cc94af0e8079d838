import { IsIn, IsNotEmpty, IsString } from 'class-validator';
import { PROFILE_ROLES } from '../../../database/schema';
import type { ProfileInput, ProfileRole } from '../../access.types';

export class ProfileFields implements ProfileInput {
  @IsString()
  @IsNotEmpty()
  id!: string;

  @IsString()
  @IsNotEmpty()
  name!: string;

  @IsString()
  @IsNotEmpty()
  companyName!: string;

  @IsIn(PROFILE_ROLES, {
    message: `role must be one of: ${PROFILE_ROLES.join(', ')}`,
  })
  role!: ProfileRole;
}
