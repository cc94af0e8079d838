// src/database/database.module.ts

import {
  DynamicModule,
  Global,
  Module,
  ModuleMetadata,
  InjectionToken,
} from '@nestjs/common';
import { EntityStore } from '../access/store/entity-store';
import { DatabaseOptions, DatabaseService } from './database.service';

export const DATABASE_OPTIONS = 'DATABASE_OPTIONS';

@Global()
@Module({})
export class DatabaseModule {
  static forRootAsync(options: {
    imports?: ModuleMetadata['imports'];
    useFactory: (...args: never[]) => DatabaseOptions;
    inject?: InjectionToken[];
  }): DynamicModule {
    return {
      module: DatabaseModule,
      imports: options.imports,
      providers: [
        {
          provide: DATABASE_OPTIONS,
          useFactory: options.useFactory,
          inject: options.inject,
        },
        {
          provide: DatabaseService,
          useFactory: (databaseOptions: DatabaseOptions) =>
            DatabaseService.open(databaseOptions),
          inject: [DATABASE_OPTIONS],
        },
        {
          provide: EntityStore,
          useFactory: (database: DatabaseService) =>
            new EntityStore(database.db, () => database.save()),
          inject: [DatabaseService],
        },
      ],
      exports: [DatabaseService, EntityStore],
    };
  }
}
