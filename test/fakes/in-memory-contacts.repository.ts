import { Contact } from '../../src/database/entities/contact.entity';
import { ContactsRepository } from '../../src/modules/contacts/contacts.repository';
import {
  ContactFields,
  ContactFilters,
} from '../../src/modules/contacts/types/contact.type';
import { uniqueViolation } from './in-memory-users.repository';

const contains = (value: string, needle: string): boolean =>
  value.toLowerCase().includes(needle.toLowerCase());

/** Stands in for ContactsRepository; `email` is unique ignoring case, as in the real table. */
export class InMemoryContactsRepository
  implements Pick<ContactsRepository, keyof ContactsRepository>
{
  private readonly rows = new Map<number, Contact>();
  private nextId = 1;

  async create(userId: number, fields: ContactFields): Promise<Contact> {
    this.assertUnique(fields.email);

    const now = new Date();
    const contact = Object.assign(new Contact(), {
      ...fields,
      id: this.nextId++,
      userId,
      createdAt: now,
      updatedAt: now,
    });
    this.rows.set(contact.id, contact);
    return this.copy(contact);
  }

  async findOwned(id: number, userId: number): Promise<Contact | null> {
    const row = this.rows.get(id);
    return row && row.userId === userId ? this.copy(row) : null;
  }

  async emailTaken(email: string, exceptId?: number): Promise<boolean> {
    return [...this.rows.values()].some(
      (contact) =>
        contact.email.toLowerCase() === email.toLowerCase() &&
        contact.id !== exceptId,
    );
  }

  async list(
    userId: number,
    filters: ContactFilters,
    limit: number,
    offset: number,
  ): Promise<{ items: Contact[]; total: number }> {
    const { q } = filters;
    const matching = this.owned(userId).filter((contact) =>
      q
        ? contains(contact.firstName, q) ||
          contains(contact.lastName, q) ||
          contains(contact.email, q)
        : (!filters.firstName || contains(contact.firstName, filters.firstName)) &&
          (!filters.lastName || contains(contact.lastName, filters.lastName)) &&
          (!filters.email || contains(contact.email, filters.email)),
    );

    return {
      items: matching.slice(offset, offset + limit).map((c) => this.copy(c)),
      total: matching.length,
    };
  }

  async findAllOwned(userId: number): Promise<Contact[]> {
    return this.owned(userId).map((c) => this.copy(c));
  }

  async update(contact: Contact, changes: Partial<ContactFields>): Promise<Contact> {
    const row = this.rows.get(contact.id);
    if (!row) throw new Error(`contact ${contact.id} vanished`);

    if (changes.email !== undefined) {
      this.assertUnique(changes.email, row.id);
    }
    Object.assign(row, changes, { updatedAt: new Date() });
    return this.copy(row);
  }

  async remove(contact: Contact): Promise<void> {
    this.rows.delete(contact.id);
  }

  private owned(userId: number): Contact[] {
    return [...this.rows.values()]
      .filter((contact) => contact.userId === userId)
      .sort((a, b) => a.id - b.id);
  }

  private assertUnique(email: string, exceptId?: number): void {
    const taken = [...this.rows.values()].some(
      (contact) =>
        contact.email.toLowerCase() === email.toLowerCase() && contact.id !== exceptId,
    );
    if (taken) {
      throw uniqueViolation('contacts');
    }
  }

  private copy(contact: Contact): Contact {
    return Object.assign(new Contact(), contact);
  }
}
