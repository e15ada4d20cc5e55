import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Brackets, Repository } from 'typeorm';
import { Contact } from '../../database/entities/contact.entity';
import { ContactFields, ContactFilters } from './types/contact.type';

/**
 * Store access for contacts. Every read is scoped to the owning user.
 */
@Injectable()
export class ContactsRepository {
  constructor(
    @InjectRepository(Contact)
    private readonly contacts: Repository<Contact>,
  ) {}

  create(userId: number, fields: ContactFields): Promise<Contact> {
    return this.contacts.save(this.contacts.create({ ...fields, userId }));
  }

  findOwned(id: number, userId: number): Promise<Contact | null> {
    return this.contacts.findOne({ where: { id, userId } });
  }

  /** Case-insensitive match across all tenants, optionally ignoring one contact. */
  emailTaken(email: string, exceptId?: number): Promise<boolean> {
    const query = this.contacts
      .createQueryBuilder('contact')
      .where('LOWER(contact.email) = LOWER(:email)', { email });

    if (exceptId !== undefined) {
      query.andWhere('contact.id != :exceptId', { exceptId });
    }

    return query.getExists();
  }

  /**
   * `q` is OR-ed over first name, last name and email; the per-field
   * filters are AND-ed. Results are ordered by id.
   */
  async list(
    userId: number,
    filters: ContactFilters,
    limit: number,
    offset: number,
  ): Promise<{ items: Contact[]; total: number }> {
    const query = this.contacts
      .createQueryBuilder('contact')
      .where('contact.userId = :userId', { userId });

    if (filters.q) {
      const pattern = `%${filters.q}%`;
      query.andWhere(
        new Brackets((search) => {
          search
            .where('contact.firstName ILIKE :pattern', { pattern })
            .orWhere('contact.lastName ILIKE :pattern', { pattern })
            .orWhere('contact.email ILIKE :pattern', { pattern });
        }),
      );
    } else {
      if (filters.firstName) {
        query.andWhere('contact.firstName ILIKE :firstName', {
          firstName: `%${filters.firstName}%`,
        });
      }
      if (filters.lastName) {
        query.andWhere('contact.lastName ILIKE :lastName', {
          lastName: `%${filters.lastName}%`,
        });
      }
      if (filters.email) {
        query.andWhere('contact.email ILIKE :email', {
          email: `%${filters.email}%`,
        });
      }
    }

    const [items, total] = await query
      .orderBy('contact.id', 'ASC')
      .skip(offset)
      .take(limit)
      .getManyAndCount();

    return { items, total };
  }

  findAllOwned(userId: number): Promise<Contact[]> {
    return this.contacts.find({ where: { userId }, order: { id: 'ASC' } });
  }

  update(contact: Contact, changes: Partial<ContactFields>): Promise<Contact> {
    return this.contacts.save(this.contacts.merge(contact, changes));
  }

  async remove(contact: Contact): Promise<void> {
    await this.contacts.delete({ id: contact.id, userId: contact.userId });
  }
}
