import {
  BadRequestException,
  Body,
  Controller,
  Get,
  NotFoundException,
  Param,
  Patch,
  UploadedFile,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { memoryStorage } from 'multer';
import { I18nService } from 'nestjs-i18n';
import { AUTH_CONSTANTS } from '../../common/constants/auth.constants';
import { CurrentUser } from '../../common/decorators/current-user.decorator';
import { Roles } from '../../common/decorators/roles.decorator';
import { User } from '../../database/entities/user.entity';
import { UserRole } from '../../database/enums/user-role.enum';
import { StorageService } from '../storage/storage.service';
import { UpdateRoleDto, UpdateStatusDto, UserIdParamDto } from './dto/users.dto';
import { UserRead } from './types/user.type';
import { toUserRead } from './user.mapper';
import { UsersService } from './users.service';

const AVATAR_MIME_TYPES: readonly string[] = AUTH_CONSTANTS.AVATAR_MIME_TYPES;

/**
 *  ├─ GET    /users/me
 *  ├─ PATCH  /users/me/avatar     ← admin, multipart field "file"
 *  ├─ PATCH  /users/:id/role      ← admin
 *  └─ PATCH  /users/:id/status    ← admin
 */
@Controller('users')
export class UsersController {
  constructor(
    private readonly usersService: UsersService,
    private readonly storage: StorageService,
    private readonly i18n: I18nService,
  ) {}

  @Get('me')
  me(@CurrentUser() user: User): UserRead {
    return toUserRead(user);
  }

  /**
   * PATCH /users/me/avatar
   *
   * Accepts JPEG, PNG, GIF or WebP up to 5 MB. The upload replaces any
   * previous avatar of the caller.
   */
  @Patch('me/avatar')
  @Roles(UserRole.ADMIN)
  @UseInterceptors(FileInterceptor('file', { storage: memoryStorage() }))
  async updateAvatar(
    @CurrentUser() user: User,
    @UploadedFile() file: Express.Multer.File | undefined,
  ): Promise<UserRead> {
    if (!file) {
      throw new BadRequestException(this.i18n.translate('users.errors.avatarMissing'));
    }
    if (!AVATAR_MIME_TYPES.includes(file.mimetype)) {
      throw new BadRequestException(this.i18n.translate('users.errors.avatarType'));
    }
    if (file.size > AUTH_CONSTANTS.AVATAR_MAX_BYTES) {
      throw new BadRequestException(this.i18n.translate('users.errors.avatarTooLarge'));
    }

    const avatarUrl = await this.storage.uploadAvatar(user.id, file.buffer, file.mimetype);
    const updated = await this.usersService.updateAvatar(user.id, avatarUrl);

    if (!updated) {
      throw new NotFoundException(this.i18n.translate('users.errors.notFound'));
    }

    return toUserRead(updated);
  }

  @Patch(':id/role')
  @Roles(UserRole.ADMIN)
  async updateRole(
    @Param() params: UserIdParamDto,
    @Body() dto: UpdateRoleDto,
  ): Promise<UserRead> {
    return toUserRead(await this.usersService.updateRole(params.id, dto.role));
  }

  @Patch(':id/status')
  @Roles(UserRole.ADMIN)
  async updateStatus(
    @Param() params: UserIdParamDto,
    @Body() dto: UpdateStatusDto,
  ): Promise<UserRead> {
    return toUserRead(await this.usersService.updateStatus(params.id, dto.isActive));
  }
}
