import { MigrationInterface, QueryRunner } from 'typeorm';

/**
 * Initial schema: users and contacts.
 *
 * Hand-written to mirror the entity definitions; column names are
 * snake_case and `contacts.user_id` cascades on user deletion. Contact
 * emails are unique regardless of case through an index on LOWER(email).
 */
export class InitialSchema1717000000000 implements MigrationInterface {
  name = 'InitialSchema1717000000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(
      `CREATE TYPE "users_role_enum" AS ENUM ('user', 'admin')`,
    );

    // ── Users ──────────────────────────────────────────────
    await queryRunner.query(`
      CREATE TABLE "users" (
        "id"            SERIAL NOT NULL,
        "email"         varchar(255) NOT NULL,
        "password_hash" varchar(255) NOT NULL,
        "full_name"     varchar(255),
        "avatar_url"    varchar(1024),
        "is_active"     boolean NOT NULL DEFAULT true,
        "is_verified"   boolean NOT NULL DEFAULT false,
        "role"          "users_role_enum" NOT NULL DEFAULT 'user',
        "created_at"    TIMESTAMPTZ NOT NULL DEFAULT now(),
        "updated_at"    TIMESTAMPTZ NOT NULL DEFAULT now(),
        CONSTRAINT "PK_users" PRIMARY KEY ("id"),
        CONSTRAINT "UQ_users_email" UNIQUE ("email")
      )
    `);

    // ── Contacts ───────────────────────────────────────────
    await queryRunner.query(`
      CREATE TABLE "contacts" (
        "id"          SERIAL NOT NULL,
        "first_name"  varchar(255) NOT NULL,
        "last_name"   varchar(255) NOT NULL,
        "email"       varchar(255) NOT NULL,
        "phone"       varchar(50) NOT NULL,
        "birthday"    date NOT NULL,
        "notes"       text,
        "user_id"     integer NOT NULL,
        "created_at"  TIMESTAMPTZ NOT NULL DEFAULT now(),
        "updated_at"  TIMESTAMPTZ NOT NULL DEFAULT now(),
        CONSTRAINT "PK_contacts" PRIMARY KEY ("id"),
        CONSTRAINT "FK_contacts_user" FOREIGN KEY ("user_id")
          REFERENCES "users" ("id") ON DELETE CASCADE
      )
    `);

    await queryRunner.query(
      `CREATE UNIQUE INDEX "UQ_contacts_email_lower" ON "contacts" (LOWER("email"))`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_contacts_user_id" ON "contacts" ("user_id")`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_contacts_first_name" ON "contacts" ("first_name")`,
    );
    await queryRunner.query(
      `CREATE INDEX "IDX_contacts_last_name" ON "contacts" ("last_name")`,
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP TABLE IF EXISTS "contacts"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "users"`);
    await queryRunner.query(`DROP TYPE IF EXISTS "users_role_enum"`);
  }
}
