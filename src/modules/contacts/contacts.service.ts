import {
  ConflictException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { I18nService } from 'nestjs-i18n';
import { isUniqueViolation } from '../../database/database.errors';
import { Contact } from '../../database/entities/contact.entity';
import {
  CalendarDate,
  parseCalendarDate,
  today,
  upcomingBirthdays,
} from './birthday.util';
import { ContactsRepository } from './contacts.repository';
import { CreateContactDto, UpdateContactDto } from './dto/contacts.dto';
import {
  ContactFields,
  ContactFilters,
  ContactListResponse,
  ContactRead,
} from './types/contact.type';

export const toContactRead = (contact: Contact): ContactRead => ({
  id: contact.id,
  firstName: contact.firstName,
  lastName: contact.lastName,
  email: contact.email,
  phone: contact.phone,
  birthday: contact.birthday,
  notes: contact.notes,
  userId: contact.userId,
});

/**
 * Address-book operations for one owner at a time. A contact owned by
 * someone else is reported exactly like a missing one.
 */
@Injectable()
export class ContactsService {
  private readonly logger = new Logger(ContactsService.name);

  constructor(
    private readonly contacts: ContactsRepository,
    private readonly i18n: I18nService,
  ) {}

  /** @throws ConflictException Email already used by any contact. */
  async create(userId: number, dto: CreateContactDto): Promise<ContactRead> {
    if (await this.contacts.emailTaken(dto.email)) {
      throw this.emailTaken();
    }

    const contact = await this.write(() =>
      this.contacts.create(userId, {
        firstName: dto.firstName,
        lastName: dto.lastName,
        email: dto.email,
        phone: dto.phone,
        birthday: dto.birthday,
        notes: dto.notes ?? null,
      }),
    );

    this.logger.debug(`User ${userId} created contact ${contact.id}`);
    return toContactRead(contact);
  }

  async list(
    userId: number,
    filters: ContactFilters,
    limit: number,
    offset: number,
  ): Promise<ContactListResponse> {
    const { items, total } = await this.contacts.list(
      userId,
      filters,
      limit,
      offset,
    );
    return { items: items.map(toContactRead), total, limit, offset };
  }

  /** @throws NotFoundException */
  async get(userId: number, id: number): Promise<ContactRead> {
    return toContactRead(await this.findOwned(userId, id));
  }

  /**
   * Full replace.
   * @throws NotFoundException
   * @throws ConflictException
   */
  async replace(
    userId: number,
    id: number,
    dto: CreateContactDto,
  ): Promise<ContactRead> {
    return this.applyChanges(userId, id, {
      firstName: dto.firstName,
      lastName: dto.lastName,
      email: dto.email,
      phone: dto.phone,
      birthday: dto.birthday,
      notes: dto.notes ?? null,
    });
  }

  /**
   * Partial update; fields absent from `dto` keep their value.
   * @throws NotFoundException
   * @throws ConflictException
   */
  async patch(
    userId: number,
    id: number,
    dto: UpdateContactDto,
  ): Promise<ContactRead> {
    const changes: Partial<ContactFields> = {};
    if (dto.firstName !== undefined) changes.firstName = dto.firstName;
    if (dto.lastName !== undefined) changes.lastName = dto.lastName;
    if (dto.email !== undefined) changes.email = dto.email;
    if (dto.phone !== undefined) changes.phone = dto.phone;
    if (dto.birthday !== undefined) changes.birthday = dto.birthday;
    if (dto.notes !== undefined) changes.notes = dto.notes;

    return this.applyChanges(userId, id, changes);
  }

  /** @throws NotFoundException */
  async remove(userId: number, id: number): Promise<void> {
    const contact = await this.findOwned(userId, id);
    await this.contacts.remove(contact);
    this.logger.debug(`User ${userId} deleted contact ${id}`);
  }

  /**
   * Contacts of `userId` whose next birthday falls within `days` days of
   * `reference` (today by default), soonest first.
   */
  async upcomingBirthdays(
    userId: number,
    days: number,
    reference: CalendarDate = today(),
  ): Promise<ContactRead[]> {
    const owned = await this.contacts.findAllOwned(userId);
    const dated = owned.flatMap((contact) => {
      const birthday = parseCalendarDate(contact.birthday);
      if (!birthday) {
        this.logger.warn(`Contact ${contact.id} has unreadable birthday "${contact.birthday}"`);
        return [];
      }
      return [{ contact, birthday }];
    });

    return upcomingBirthdays(dated, (entry) => entry.birthday, reference, days).map(
      (entry) => toContactRead(entry.contact),
    );
  }

  // ============================================================================
  // HELPERS
  // ============================================================================

  private async applyChanges(
    userId: number,
    id: number,
    changes: Partial<ContactFields>,
  ): Promise<ContactRead> {
    const contact = await this.findOwned(userId, id);

    if (
      changes.email !== undefined &&
      changes.email.toLowerCase() !== contact.email.toLowerCase() &&
      (await this.contacts.emailTaken(changes.email, contact.id))
    ) {
      throw this.emailTaken();
    }

    const updated = await this.write(() => this.contacts.update(contact, changes));
    return toContactRead(updated);
  }

  private async findOwned(userId: number, id: number): Promise<Contact> {
    const contact = await this.contacts.findOwned(id, userId);
    if (!contact) {
      throw new NotFoundException(
        this.i18n.translate('contacts.errors.notFound', { args: { id } }),
      );
    }
    return contact;
  }

  /** Runs a store write, reporting a unique violation as a conflict. */
  private async write(operation: () => Promise<Contact>): Promise<Contact> {
    try {
      return await operation();
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw this.emailTaken();
      }
      throw error;
    }
  }

  private emailTaken(): ConflictException {
    return new ConflictException(
      this.i18n.translate('contacts.errors.emailAlreadyExists'),
    );
  }
}
