import { Type } from 'class-transformer';
import { IsBoolean, IsEnum, IsInt, Max, Min } from 'class-validator';
import { i18nValidationMessage } from 'nestjs-i18n';
import { MAX_ID } from '../../../database/database.constants';
import { UserRole } from '../../../database/enums/user-role.enum';

export class UserIdParamDto {
  @Max(MAX_ID, {
    message: i18nValidationMessage('validation.MAX'),
  })
  @Min(1, {
    message: i18nValidationMessage('validation.MIN'),
  })
  @IsInt({
    message: i18nValidationMessage('validation.INT'),
  })
  @Type(() => Number)
  id!: number;
}

export class UpdateRoleDto {
  @IsEnum(UserRole, {
    message: i18nValidationMessage('validation.ENUM'),
  })
  role!: UserRole;
}

export class UpdateStatusDto {
  @IsBoolean({
    message: i18nValidationMessage('validation.BOOLEAN'),
  })
  isActive!: boolean;
}
