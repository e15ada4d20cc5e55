import { Transform, Type } from 'class-transformer';
import {
  IsEmail,
  IsInt,
  IsOptional,
  IsString,
  Length,
  Matches,
  Max,
  MaxLength,
  Min,
  Validate,
  ValidateIf,
  ValidatorConstraint,
  ValidatorConstraintInterface,
} from 'class-validator';
import { i18nValidationMessage } from 'nestjs-i18n';
import { MAX_ID } from '../../../database/database.constants';
import { parseCalendarDate } from '../birthday.util';

/** Digits, spaces, parentheses, dots and dashes, with an optional leading +. */
const PHONE_PATTERN = /^\+?[0-9()\-.\s]{7,20}$/;

/** Validates `null` too, so only an absent field is skipped. */
const isPresent = (_dto: object, value: unknown): boolean => value !== undefined;

const trim = ({ value }: { value: unknown }): unknown =>
  typeof value === 'string' ? value.trim() : value;

/**
 * Real calendar date in 'YYYY-MM-DD' form
 */
@ValidatorConstraint({ name: 'isCalendarDate', async: false })
class IsCalendarDate implements ValidatorConstraintInterface {
  validate(value: unknown): boolean {
    return typeof value === 'string' && parseCalendarDate(value) !== null;
  }

  defaultMessage(): string {
    return 'Date must be a valid YYYY-MM-DD calendar date';
  }
}

/**
 * DTO for POST /contacts and PUT /contacts/:id
 */
export class CreateContactDto {
  @Length(1, 255, {
    message: i18nValidationMessage('validation.LENGTH'),
  })
  @IsString({
    message: i18nValidationMessage('validation.STRING'),
  })
  @Transform(trim)
  firstName!: string;

  @Length(1, 255, {
    message: i18nValidationMessage('validation.LENGTH'),
  })
  @IsString({
    message: i18nValidationMessage('validation.STRING'),
  })
  @Transform(trim)
  lastName!: string;

  @MaxLength(255, {
    message: i18nValidationMessage('validation.MAX_LENGTH'),
  })
  @IsEmail(
    {},
    {
      message: i18nValidationMessage('validation.EMAIL'),
    },
  )
  @Transform(trim)
  email!: string;

  @Matches(PHONE_PATTERN, {
    message: i18nValidationMessage('validation.PHONE'),
  })
  @Length(7, 50, {
    message: i18nValidationMessage('validation.LENGTH'),
  })
  @IsString({
    message: i18nValidationMessage('validation.STRING'),
  })
  phone!: string;

  @Validate(IsCalendarDate, {
    message: i18nValidationMessage('validation.DATE'),
  })
  birthday!: string;

  @IsOptional()
  @MaxLength(5000, {
    message: i18nValidationMessage('validation.MAX_LENGTH'),
  })
  @IsString({
    message: i18nValidationMessage('validation.STRING'),
  })
  notes?: string | null;
}

/**
 * DTO for PATCH /contacts/:id; absent fields are left unchanged
 */
export class UpdateContactDto {
  @ValidateIf(isPresent)
  @Length(1, 255, {
    message: i18nValidationMessage('validation.LENGTH'),
  })
  @IsString({
    message: i18nValidationMessage('validation.STRING'),
  })
  @Transform(trim)
  firstName?: string;

  @ValidateIf(isPresent)
  @Length(1, 255, {
    message: i18nValidationMessage('validation.LENGTH'),
  })
  @IsString({
    message: i18nValidationMessage('validation.STRING'),
  })
  @Transform(trim)
  lastName?: string;

  @ValidateIf(isPresent)
  @MaxLength(255, {
    message: i18nValidationMessage('validation.MAX_LENGTH'),
  })
  @IsEmail(
    {},
    {
      message: i18nValidationMessage('validation.EMAIL'),
    },
  )
  @Transform(trim)
  email?: string;

  @ValidateIf(isPresent)
  @Matches(PHONE_PATTERN, {
    message: i18nValidationMessage('validation.PHONE'),
  })
  @Length(7, 50, {
    message: i18nValidationMessage('validation.LENGTH'),
  })
  @IsString({
    message: i18nValidationMessage('validation.STRING'),
  })
  phone?: string;

  @ValidateIf(isPresent)
  @Validate(IsCalendarDate, {
    message: i18nValidationMessage('validation.DATE'),
  })
  birthday?: string;

  // null clears the notes; only undefined means "leave unchanged"
  @ValidateIf((dto: UpdateContactDto) => dto.notes !== undefined && dto.notes !== null)
  @MaxLength(5000, {
    message: i18nValidationMessage('validation.MAX_LENGTH'),
  })
  @IsString({
    message: i18nValidationMessage('validation.STRING'),
  })
  notes?: string | null;
}

/**
 * Query DTO for GET /contacts
 *
 * `q` searches first name, last name and email together; the per-field
 * filters are combined with AND. All matching is case-insensitive and partial.
 */
export class ListContactsQueryDto {
  @IsOptional()
  @IsString({
    message: i18nValidationMessage('validation.STRING'),
  })
  q?: string;

  @IsOptional()
  @IsString({
    message: i18nValidationMessage('validation.STRING'),
  })
  firstName?: string;

  @IsOptional()
  @IsString({
    message: i18nValidationMessage('validation.STRING'),
  })
  lastName?: string;

  @IsOptional()
  @IsString({
    message: i18nValidationMessage('validation.STRING'),
  })
  email?: string;

  @Max(100, {
    message: i18nValidationMessage('validation.MAX'),
  })
  @Min(1, {
    message: i18nValidationMessage('validation.MIN'),
  })
  @IsInt({
    message: i18nValidationMessage('validation.INT'),
  })
  @Type(() => Number)
  limit: number = 20;

  @Min(0, {
    message: i18nValidationMessage('validation.MIN'),
  })
  @IsInt({
    message: i18nValidationMessage('validation.INT'),
  })
  @Type(() => Number)
  offset: number = 0;
}

/**
 * Query DTO for GET /contacts/upcoming-birthdays
 */
export class UpcomingBirthdaysQueryDto {
  @Max(365, {
    message: i18nValidationMessage('validation.MAX'),
  })
  @Min(1, {
    message: i18nValidationMessage('validation.MIN'),
  })
  @IsInt({
    message: i18nValidationMessage('validation.INT'),
  })
  @Type(() => Number)
  days: number = 7;
}

export class ContactIdParamDto {
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
