import { Transform } from 'class-transformer';
import {
  IsEmail,
  IsNotEmpty,
  IsOptional,
  IsString,
  Length,
  MaxLength,
} from 'class-validator';
import { i18nValidationMessage } from 'nestjs-i18n';
import { AUTH_CONSTANTS } from '../../../common/constants/auth.constants';

/**
 * Custom transform functions
 */
const trim = ({ value }: { value: unknown }): unknown =>
  typeof value === 'string' ? value.trim() : value;

const trimLower = ({ value }: { value: unknown }): unknown =>
  typeof value === 'string' ? value.trim().toLowerCase() : value;

/**
 * DTO for user registration
 */
export class RegisterDto {
  @IsEmail(
    {},
    {
      message: i18nValidationMessage('validation.EMAIL'),
    },
  )
  @MaxLength(255, {
    message: i18nValidationMessage('validation.MAX_LENGTH'),
  })
  @IsNotEmpty({
    message: i18nValidationMessage('validation.NOT_EMPTY'),
  })
  @Transform(trimLower)
  email!: string;

  @Length(AUTH_CONSTANTS.PASSWORD_MIN_LENGTH, AUTH_CONSTANTS.PASSWORD_MAX_LENGTH, {
    message: i18nValidationMessage('validation.LENGTH'),
  })
  @IsString({
    message: i18nValidationMessage('validation.STRING'),
  })
  password!: string;

  @IsOptional()
  @MaxLength(255, {
    message: i18nValidationMessage('validation.MAX_LENGTH'),
  })
  @IsString({
    message: i18nValidationMessage('validation.STRING'),
  })
  @Transform(trim)
  fullName?: string;
}

/**
 * DTO for login
 */
export class LoginDto {
  @IsEmail(
    {},
    {
      message: i18nValidationMessage('validation.EMAIL'),
    },
  )
  @IsNotEmpty({
    message: i18nValidationMessage('validation.NOT_EMPTY'),
  })
  @Transform(trimLower)
  email!: string;

  @IsNotEmpty({
    message: i18nValidationMessage('validation.NOT_EMPTY'),
  })
  @IsString({
    message: i18nValidationMessage('validation.STRING'),
  })
  password!: string;
}

/**
 * DTO for resend-verification and request-password-reset
 */
export class EmailDto {
  @IsEmail(
    {},
    {
      message: i18nValidationMessage('validation.EMAIL'),
    },
  )
  @IsNotEmpty({
    message: i18nValidationMessage('validation.NOT_EMPTY'),
  })
  @Transform(trimLower)
  email!: string;
}

/**
 * Query DTO for link-style endpoints (?token=...)
 */
export class TokenQueryDto {
  @IsNotEmpty({
    message: i18nValidationMessage('validation.NOT_EMPTY'),
  })
  @IsString({
    message: i18nValidationMessage('validation.STRING'),
  })
  token!: string;
}

/**
 * DTO for setting a new password with a reset token
 */
export class ResetPasswordDto extends TokenQueryDto {
  @Length(AUTH_CONSTANTS.PASSWORD_MIN_LENGTH, AUTH_CONSTANTS.PASSWORD_MAX_LENGTH, {
    message: i18nValidationMessage('validation.LENGTH'),
  })
  @IsString({
    message: i18nValidationMessage('validation.STRING'),
  })
  newPassword!: string;
}
