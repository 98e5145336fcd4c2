import { Global, Module } from '@nestjs/common';
import { PgService } from './pg.service';
import { PgDataStore } from './pg-data-store';
import { DATA_STORE } from './database.types';

@Global()
@Module({
  providers: [
    PgService,
    PgDataStore,
    { provide: DATA_STORE, useExisting: PgDataStore },
  ],
  exports: [PgService, DATA_STORE],
})
export class DatabaseModule {}
