import { DynamicModule, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Contact } from './entities/contact.entity';
import { User } from './entities/user.entity';

/** All entity classes registered with the connection */
const ENTITIES = [User, Contact];

/**
 * DatabaseModule owns the PostgreSQL connection and entity repositories.
 *
 * `forRoot()` is imported once by AppModule; feature modules import
 * `forFeature()` to inject `Repository<User>` / `Repository<Contact>`.
 */
@Module({})
export class DatabaseModule {
  static forRoot(): DynamicModule {
    return {
      module: DatabaseModule,
      imports: [
        TypeOrmModule.forRootAsync({
          imports: [ConfigModule],
          inject: [ConfigService],
          useFactory: (config: ConfigService) => ({
            type: 'postgres' as const,
            url: config.get<string>('database.url'),
            entities: ENTITIES,
            synchronize: false,
            logging: config.get<boolean>('database.logging', false),
          }),
        }),
      ],
    };
  }

  static forFeature(): DynamicModule {
    return {
      module: DatabaseModule,
      imports: [TypeOrmModule.forFeature(ENTITIES)],
      exports: [TypeOrmModule],
    };
  }
}
