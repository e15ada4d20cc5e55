import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
} from 'typeorm';
import { User } from './user.entity';

/**
 * Address-book entry owned by exactly one user.
 *
 * `email` is unique across all tenants, ignoring case. The expression index
 * lives in the migration; TypeORM cannot declare it. `birthday` is a SQL
 * `date` and is read back by the pg driver as a 'YYYY-MM-DD' string.
 */
@Entity('contacts')
@Index('UQ_contacts_email_lower', { synchronize: false })
export class Contact {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 255, name: 'first_name' })
  firstName!: string;

  @Column({ type: 'varchar', length: 255, name: 'last_name' })
  lastName!: string;

  @Column({ type: 'varchar', length: 255 })
  email!: string;

  @Column({ type: 'varchar', length: 50 })
  phone!: string;

  @Column({ type: 'date' })
  birthday!: string;

  @Column({ type: 'text', nullable: true })
  notes!: string | null;

  @Index('IDX_contacts_user_id')
  @Column({ type: 'int', name: 'user_id' })
  userId!: number;

  @CreateDateColumn({ type: 'timestamptz', name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ type: 'timestamptz', name: 'updated_at' })
  updatedAt!: Date;

  // ── Relations ────────────────────────────────────────────

  @ManyToOne(() => User, (user) => user.contacts, {
    onDelete: 'CASCADE',
    nullable: false,
  })
  @JoinColumn({ name: 'user_id' })
  owner!: User;
}
