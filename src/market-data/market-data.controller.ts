import { BadRequestException, Body, Controller, Get, HttpCode, HttpStatus, Post, Query } from '@nestjs/common';
import { MarketDataService } from './market-data.service';
import { BulkUpdatePricesDto, RecordBarsDto, UpdatePriceDto } from './dto/update-price.dto';
import { MarketPricesResponseDto } from './dto/market-prices-response.dto';

@Controller('market-data')
export class MarketDataController {
  constructor(private readonly marketData: MarketDataService) {}

  /**
   * Returns latest known closes with last update timestamp.
   *
   * GET /market-data/prices?symbols=THYAO,SISE
   */
  @Get('prices')
  @HttpCode(HttpStatus.OK)
  getPrices(@Query('symbols') symbolsQuery?: string): MarketPricesResponseDto {
    const symbols = symbolsQuery ? symbolsQuery.split(',').map((s) => s.trim()) : undefined;
    return {
      prices: this.marketData.getLatestPrices(symbols),
      lastUpdated: this.marketData.getLastUpdateTime().toISOString(),
      source: 'manual',
    };
  }

  /**
   * Records a close for a single symbol.
   *
   * POST /market-data/prices/update
   */
  @Post('prices/update')
  @HttpCode(HttpStatus.OK)
  updatePrice(@Body() dto: UpdatePriceDto) {
    this.marketData.updatePrice(dto.symbol, dto.price, dto.date);
    return {
      message: `Price updated for ${dto.symbol}`,
      symbol: dto.symbol,
      price: dto.price,
    };
  }

  /**
   * Batch close updates across multiple symbols.
   *
   * POST /market-data/prices/bulk
   */
  @Post('prices/bulk')
  @HttpCode(HttpStatus.OK)
  bulkUpdatePrices(@Body() dto: BulkUpdatePricesDto) {
    try {
      this.marketData.updatePrices(dto.prices, dto.date);
    } catch (error) {
      throw new BadRequestException(error instanceof Error ? error.message : String(error));
    }
    return {
      message: 'Market prices updated',
      updatedSymbols: Object.keys(dto.prices),
      prices: dto.prices,
    };
  }

  /**
   * Merges daily OHLCV bars into a symbol's history.
   *
   * POST /market-data/bars
   */
  @Post('bars')
  @HttpCode(HttpStatus.CREATED)
  recordBars(@Body() dto: RecordBarsDto) {
    this.marketData.recordBars(dto.symbol, dto.bars);
    return {
      message: `Recorded ${dto.bars.length} bars for ${dto.symbol}`,
      symbol: dto.symbol,
      count: dto.bars.length,
    };
  }
}
