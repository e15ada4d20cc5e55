import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { User } from '../../database/entities/user.entity';
import { NewUser, UserUpdate } from './types/user.type';

/**
 * Store access for users. Emails are normalised to lower case on the way in,
 * so lookups are case-insensitive against the unique column.
 *
 * Writes are single statements; unique violations surface as TypeORM's
 * `QueryFailedError` for the caller to convert.
 */
@Injectable()
export class UsersRepository {
  constructor(
    @InjectRepository(User)
    private readonly users: Repository<User>,
  ) {}

  findById(id: number): Promise<User | null> {
    return this.users.findOne({ where: { id } });
  }

  findByEmail(email: string): Promise<User | null> {
    return this.users.findOne({ where: { email: email.trim().toLowerCase() } });
  }

  async existsByEmail(email: string): Promise<boolean> {
    return this.users.exists({ where: { email: email.trim().toLowerCase() } });
  }

  create(data: NewUser): Promise<User> {
    return this.users.save(
      this.users.create({
        email: data.email.trim().toLowerCase(),
        passwordHash: data.passwordHash,
        fullName: data.fullName,
      }),
    );
  }

  /** Applies `changes` and returns the fresh row, or `null` when no row has `id`. */
  async update(id: number, changes: UserUpdate): Promise<User | null> {
    const result = await this.users.update({ id }, changes);
    if (result.affected === 0) return null;
    return this.findById(id);
  }
}
