import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { TtlCache } from '../../common/cache/ttl-cache';
import { INJECTION_TOKENS } from '../../common/constants/injection-tokens';
import { Clock } from '../../common/time/clock';
import { EnvVars } from '../../config/config.schema';
import {
  createFinnhubHttpClient,
  createFinnhubRateLimiter,
  getFinnhubClientSettings,
  getMarketDataSettings,
} from '../../config/market-data.config';
import { MarketDataService } from './application/market-data.service';
import { IMarketDataProvider } from './domain/ports/market-data-provider.port';
import { FinnhubHttpAdapter } from './infrastructure/adapters/finnhub-http.adapter';
import { MockMarketDataAdapter } from './infrastructure/adapters/mock-market-data.adapter';
import { DashboardController } from './infrastructure/controllers/dashboard.controller';

const ttlCacheFactory = {
  inject: [INJECTION_TOKENS.CLOCK],
  useFactory: (clock: Clock) => new TtlCache(clock),
};

/**
 * Market data module: Finnhub or fixture data behind IMarketDataProvider,
 * cached per feed and rendered as dashboard fragments.
 */
@Module({
  controllers: [DashboardController],
  providers: [
    {
      provide: INJECTION_TOKENS.MARKET_DATA_SETTINGS,
      inject: [ConfigService],
      useFactory: getMarketDataSettings,
    },
    {
      provide: INJECTION_TOKENS.FINNHUB_CLIENT_SETTINGS,
      inject: [ConfigService],
      useFactory: getFinnhubClientSettings,
    },
    {
      provide: INJECTION_TOKENS.FINNHUB_HTTP_CLIENT,
      inject: [INJECTION_TOKENS.FINNHUB_CLIENT_SETTINGS],
      useFactory: createFinnhubHttpClient,
    },
    {
      provide: INJECTION_TOKENS.FINNHUB_RATE_LIMITER,
      inject: [INJECTION_TOKENS.FINNHUB_CLIENT_SETTINGS],
      useFactory: createFinnhubRateLimiter,
    },
    { provide: INJECTION_TOKENS.SCREENER_CACHE, ...ttlCacheFactory },
    { provide: INJECTION_TOKENS.PROFILE_CACHE, ...ttlCacheFactory },
    { provide: INJECTION_TOKENS.NEWS_CACHE, ...ttlCacheFactory },
    FinnhubHttpAdapter,
    MockMarketDataAdapter,
    {
      provide: INJECTION_TOKENS.MARKET_DATA_PROVIDER,
      inject: [ConfigService, FinnhubHttpAdapter, MockMarketDataAdapter],
      useFactory: (
        config: ConfigService<EnvVars, true>,
        finnhub: FinnhubHttpAdapter,
        mock: MockMarketDataAdapter,
      ): IMarketDataProvider =>
        config.get('MARKET_DATA_SOURCE', { infer: true }) === 'finnhub' ? finnhub : mock,
    },
    MarketDataService,
  ],
  exports: [MarketDataService],
})
export class MarketDataModule {}
