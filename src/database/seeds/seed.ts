import 'reflect-metadata';
import { argon2id, hash } from 'argon2';
import AppDataSource from '../data-source';
import { User } from '../entities/user.entity';
import { UserRole } from '../enums/user-role.enum';

/**
 * Creates the default administrator if no account uses its email yet.
 * Run after migrations: `npm run seed`.
 */
async function main(): Promise<void> {
  console.log('Starting database seeding...');
  await AppDataSource.initialize();

  const email = (process.env.ADMIN_EMAIL ?? 'admin@example.com').toLowerCase();
  const password = process.env.ADMIN_PASSWORD ?? 'Admin@123';
  const users = AppDataSource.getRepository(User);

  const existing = await users.findOne({ where: { email } });
  if (existing) {
    console.log(`Admin user already present: ${existing.email}`);
    return;
  }

  const adminUser = await users.save(
    users.create({
      email,
      passwordHash: await hash(password, { type: argon2id }),
      fullName: 'Admin User',
      isActive: true,
      isVerified: true,
      role: UserRole.ADMIN,
    }),
  );

  console.log(`Created admin user: ${adminUser.email}`);
  console.log('\nDatabase seeding completed successfully!');
}

main()
  .catch((error: Error) => {
    console.error('Seeding failed:', error);
    process.exitCode = 1;
  })
  .finally(async () => {
    if (AppDataSource.isInitialized) {
      await AppDataSource.destroy();
    }
  });
