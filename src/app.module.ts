import { Module } from '@nestjs/common';
import { ApiModule } from './api.module';
import { DatabaseModule } from './database/database.module';

@Module({
  imports: [DatabaseModule.forRoot(), ApiModule],
})
export class AppModule {}
