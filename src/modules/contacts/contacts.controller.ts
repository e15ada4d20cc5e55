import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Patch,
  Post,
  Put,
  Query,
} from '@nestjs/common';
import { I18nService } from 'nestjs-i18n';
import { CurrentUser } from '../../common/decorators/current-user.decorator';
import { User } from '../../database/entities/user.entity';
import { MessageResponse } from '../auth/types/auth.type';
import { ContactsService } from './contacts.service';
import {
  ContactIdParamDto,
  CreateContactDto,
  ListContactsQueryDto,
  UpcomingBirthdaysQueryDto,
  UpdateContactDto,
} from './dto/contacts.dto';
import { ContactListResponse, ContactRead } from './types/contact.type';

/**
 * Address book of the authenticated user:
 *
 *  ├─ POST   /contacts
 *  ├─ GET    /contacts                      ← search + pagination
 *  ├─ GET    /contacts/upcoming-birthdays   ← ?days=1..365
 *  ├─ GET    /contacts/:id
 *  ├─ PUT    /contacts/:id                  ← full replace
 *  ├─ PATCH  /contacts/:id                  ← partial update
 *  └─ DELETE /contacts/:id
 */
@Controller('contacts')
export class ContactsController {
  constructor(
    private readonly contactsService: ContactsService,
    private readonly i18n: I18nService,
  ) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  create(
    @CurrentUser() user: User,
    @Body() dto: CreateContactDto,
  ): Promise<ContactRead> {
    return this.contactsService.create(user.id, dto);
  }

  @Get()
  list(
    @CurrentUser() user: User,
    @Query() query: ListContactsQueryDto,
  ): Promise<ContactListResponse> {
    const { limit, offset, ...filters } = query;
    return this.contactsService.list(user.id, filters, limit, offset);
  }

  @Get('upcoming-birthdays')
  upcomingBirthdays(
    @CurrentUser() user: User,
    @Query() query: UpcomingBirthdaysQueryDto,
  ): Promise<ContactRead[]> {
    return this.contactsService.upcomingBirthdays(user.id, query.days);
  }

  @Get(':id')
  get(
    @CurrentUser() user: User,
    @Param() params: ContactIdParamDto,
  ): Promise<ContactRead> {
    return this.contactsService.get(user.id, params.id);
  }

  @Put(':id')
  replace(
    @CurrentUser() user: User,
    @Param() params: ContactIdParamDto,
    @Body() dto: CreateContactDto,
  ): Promise<ContactRead> {
    return this.contactsService.replace(user.id, params.id, dto);
  }

  @Patch(':id')
  patch(
    @CurrentUser() user: User,
    @Param() params: ContactIdParamDto,
    @Body() dto: UpdateContactDto,
  ): Promise<ContactRead> {
    return this.contactsService.patch(user.id, params.id, dto);
  }

  @Delete(':id')
  async remove(
    @CurrentUser() user: User,
    @Param() params: ContactIdParamDto,
  ): Promise<MessageResponse> {
    await this.contactsService.remove(user.id, params.id);
    return {
      message: this.i18n.translate('contacts.messages.deleted', {
        args: { id: params.id },
      }),
    };
  }
}
