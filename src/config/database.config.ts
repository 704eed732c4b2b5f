import type { TypeOrmModuleOptions } from '@nestjs/typeorm';
import { RenderJob } from '../modules/render-jobs/entities/render-job.entity';

export const buildDatabaseOptions = (env: NodeJS.ProcessEnv): TypeOrmModuleOptions => {
  const common = {
    autoLoadEntities: true,
    synchronize: env.DB_SYNCHRONIZE !== 'false',
    entities: [RenderJob],
  };

  if (env.DB_TYPE === 'better-sqlite3' || env.DB_TYPE === 'sqlite') {
    return {
      ...common,
      type: 'better-sqlite3',
      database: env.DB_PATH ?? 'jobs.db',
    };
  }

  return {
    ...common,
    type: 'postgres',
    host: env.DB_HOST,
    port: Number(env.DB_PORT ?? 5432),
    username: env.DB_USERNAME,
    password: env.DB_PASSWORD,
    database: env.DB_NAME,
    ssl:
      env.DB_SSL === 'true'
        ? { rejectUnauthorized: false }
        : env.DB_SSL === 'false'
          ? false
          : env.NODE_ENV === 'production'
            ? { rejectUnauthorized: false }
            : false,
    extra: {
      max: 5,
    },
  };
};
