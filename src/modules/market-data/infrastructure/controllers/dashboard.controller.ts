import { Controller, Get, Header, Inject, Query, UseFilters } from '@nestjs/common';
import { ApiOkResponse, ApiOperation, ApiProduces, ApiTags } from '@nestjs/swagger';
import { DateTime } from 'luxon';

import { INJECTION_TOKENS } from '../../../../common/constants/injection-tokens';
import { Clock } from '../../../../common/time/clock';
import {
  DEFAULT_PROFILE_SYMBOL,
  MarketDataService,
} from '../../application/market-data.service';
import { MarketDataSettings } from '../../domain/models/market-data-settings.model';
import { ScreenerSignal, screenerLabel } from '../../domain/models/screener.model';
import { NewsQueryDto } from '../../dto/news-query.dto';
import { ProfileQueryDto } from '../../dto/profile-query.dto';
import {
  renderCompanyProfile,
  renderErrorFragment,
  renderNewsFeed,
  renderScreenerTable,
} from '../views/fragments';
import { FragmentValidationFilter } from '../filters/fragment-validation.filter';
import { renderIndexPage } from '../views/index-page';

const HTML = 'text/html; charset=utf-8';

/**
 * DashboardController - the dashboard page and the htmx fragments it polls.
 * Provider failures and rejected queries render an error fragment with 200
 * so polling continues.
 */
@ApiTags('Dashboard')
@ApiProduces('text/html')
@UseFilters(FragmentValidationFilter)
@Controller()
export class DashboardController {
  constructor(
    private readonly marketDataService: MarketDataService,
    @Inject(INJECTION_TOKENS.MARKET_DATA_SETTINGS)
    private readonly settings: MarketDataSettings,
    @Inject(INJECTION_TOKENS.CLOCK)
    private readonly clock: Clock,
  ) {}

  @Get()
  @Header('Content-Type', HTML)
  @ApiOperation({ summary: 'Dashboard page' })
  @ApiOkResponse({ description: 'HTML page' })
  index(): string {
    return renderIndexPage(this.settings.pollingIntervalSeconds, DEFAULT_PROFILE_SYMBOL);
  }

  @Get('data/most-active')
  @Header('Content-Type', HTML)
  @ApiOperation({ summary: 'Most active stocks table fragment' })
  @ApiOkResponse({ description: 'HTML fragment' })
  mostActive(): Promise<string> {
    return this.screener('most_active');
  }

  @Get('data/gainers')
  @Header('Content-Type', HTML)
  @ApiOperation({ summary: 'Top gainers table fragment' })
  @ApiOkResponse({ description: 'HTML fragment' })
  gainers(): Promise<string> {
    return this.screener('gainers');
  }

  @Get('data/losers')
  @Header('Content-Type', HTML)
  @ApiOperation({ summary: 'Top losers table fragment' })
  @ApiOkResponse({ description: 'HTML fragment' })
  losers(): Promise<string> {
    return this.screener('losers');
  }

  @Get('data/profile')
  @Header('Content-Type', HTML)
  @ApiOperation({ summary: 'Company profile card fragment' })
  @ApiOkResponse({ description: 'HTML fragment' })
  async profile(@Query() query: ProfileQueryDto): Promise<string> {
    const symbol = query.symbol ?? DEFAULT_PROFILE_SYMBOL;
    const result = await this.marketDataService.getCompanyProfile(symbol);
    const updatedAt = this.updatedAt();

    if (result.isFailure) {
      return renderErrorFragment(
        `company profile ${symbol}`,
        result.getError().message,
        updatedAt,
      );
    }
    return renderCompanyProfile(result.getValue(), updatedAt);
  }

  @Get('data/news')
  @Header('Content-Type', HTML)
  @ApiOperation({ summary: 'Market news list fragment' })
  @ApiOkResponse({ description: 'HTML fragment' })
  async news(@Query() query: NewsQueryDto): Promise<string> {
    const result = await this.marketDataService.getNews(query.category);
    const updatedAt = this.updatedAt();

    if (result.isFailure) {
      return renderErrorFragment('news', result.getError().message, updatedAt);
    }
    const { category, articles } = result.getValue();
    return renderNewsFeed(category, articles, updatedAt);
  }

  private async screener(signal: ScreenerSignal): Promise<string> {
    const result = await this.marketDataService.getScreener(signal);
    const updatedAt = this.updatedAt();

    if (result.isFailure) {
      return renderErrorFragment(screenerLabel(signal), result.getError().message, updatedAt);
    }
    return renderScreenerTable(signal, result.getValue(), updatedAt);
  }

  private updatedAt(): string {
    return DateTime.fromMillis(this.clock.now()).toFormat('HH:mm:ss');
  }
}
