import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { buildDatabaseOptions } from './config/database.config';
import { renderJobsConfig } from './config/render-jobs.config';
import { RenderJobsModule } from './modules/render-jobs/render-jobs.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [renderJobsConfig],
    }),

    TypeOrmModule.forRootAsync({
      useFactory: () => buildDatabaseOptions(process.env),
    }),

    RenderJobsModule,
  ],
})
export class AppModule {}
