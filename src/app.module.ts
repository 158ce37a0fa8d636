// Nest Modules
import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';

// Shared Modules
import { CommonModule } from './common/common.module';
import { LoggingModule } from './modules/logging/logging.module';
import { MarketDataModule } from './modules/market-data/market-data.module';

// Controller
import { AppController } from './app.controller';

// Config Schema
import { configValidationSchema } from './config/config.schema';

@Module({
  imports: [
    // Validation Schemas
    ConfigModule.forRoot({
      validationSchema: configValidationSchema,
      isGlobal: true,
    }),

    // Intervals (log rotation check)
    ScheduleModule.forRoot(),

    // Modules
    CommonModule,
    LoggingModule,
    MarketDataModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
