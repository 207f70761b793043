import { Module } from '@nestjs/common';
import { pgPoolProvider } from './database.providers';
import { DatabaseService } from './database.service';

@Module({
  providers: [pgPoolProvider, DatabaseService],
  exports: [DatabaseService],
})
export class DatabaseModule {}
