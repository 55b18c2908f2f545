import { Injectable } from '@nestjs/common';
import knownSplits from './known-splits.json';
import { LedgerReplayService } from '../ledger/ledger-replay.service';
import { AssetType, Ledger, TransactionType } from '../ledger/entities/transaction.entity';
import { PriceBar, PriceSeries } from '../market-data/price-series';
import { IsoDate } from '../common/utils/date.util';
import { analysisError, AnalysisResult } from '../common/interfaces/analysis-result.interface';

export interface SplitDeclaration {
  date: IsoDate;
  ratio: number;    // new shares per old share, e.g. 11 for 1 → 11
}

export const KNOWN_STOCK_SPLITS: Readonly<Record<string, SplitDeclaration>> = knownSplits;

/** Transaction fields produced from a percentage event, ready for the ledger. */
export interface CorporateActionDraft {
  type: TransactionType.DIVIDEND | TransactionType.SPLIT;
  symbol: string;
  date: IsoDate;
  quantity: number;
  price: number;
  assetType: AssetType;
  note: string;
  sharesHeld: number;
}

// Corporate actions: split normalization of price history and
// percentage-declared dividends / bonus issues turned into ledger entries.
@Injectable()
export class CorporateActionService {
  constructor(private readonly replay: LedgerReplayService) {}

  /**
   * Rescales bars strictly before `splitDate`: OHLC ÷ ratio, volume × ratio.
   * Bars on or after the split date are untouched. Returns a new series.
   */
  adjustForSplit(series: PriceSeries, symbol: string, splitDate: IsoDate, ratio: number): PriceSeries {
    if (!(ratio > 0) || !series.has(symbol)) {
      return series;
    }
    const adjusted = series.bars(symbol).map((bar): PriceBar =>
      bar.date < splitDate
        ? {
            date: bar.date,
            open: bar.open / ratio,
            high: bar.high / ratio,
            low: bar.low / ratio,
            close: bar.close / ratio,
            volume: bar.volume * ratio,
          }
        : bar,
    );
    return series.withBars(symbol, adjusted);
  }

  /** Applies every declared split whose symbol appears in the series. */
  applyKnownSplits(
    series: PriceSeries,
    splits: Readonly<Record<string, SplitDeclaration>> = KNOWN_STOCK_SPLITS,
  ): PriceSeries {
    return Object.entries(splits).reduce(
      (adjusted, [symbol, split]) => this.adjustForSplit(adjusted, symbol, split.date, split.ratio),
      series,
    );
  }

  /** Split ratio of a bonus issue declared as a percentage: 50% → 1.5. */
  ratioFromPercentage(percentage: number): number {
    return 1 + percentage / 100;
  }

  /**
   * Dividend declared as a percentage of nominal value.
   * Cash = shares held before the event date × percentage / 100.
   */
  resolveDividend(ledger: Ledger, symbol: string, date: IsoDate, percentage: number): AnalysisResult<CorporateActionDraft> {
    const sharesHeld = this.replay.holdingsBefore(ledger, symbol, date);
    if (sharesHeld <= 0) {
      return noSharesHeld(symbol, date);
    }
    return {
      type: TransactionType.DIVIDEND,
      symbol,
      date,
      quantity: 0,
      price: sharesHeld * (percentage / 100),
      assetType: AssetType.STOCK,
      note: `Dividend (${percentage}%)`,
      sharesHeld,
    };
  }

  /**
   * Bonus issue declared as a percentage, recorded as a split of
   * shares held before the event date × (ratio - 1) new shares.
   */
  resolveBonusIssue(ledger: Ledger, symbol: string, date: IsoDate, percentage: number): AnalysisResult<CorporateActionDraft> {
    const sharesHeld = this.replay.holdingsBefore(ledger, symbol, date);
    if (sharesHeld <= 0) {
      return noSharesHeld(symbol, date);
    }
    const ratio = this.ratioFromPercentage(percentage);
    return {
      type: TransactionType.SPLIT,
      symbol,
      date,
      quantity: sharesHeld * (ratio - 1),
      price: 0,
      assetType: AssetType.STOCK,
      note: `Stock Split (${ratio}-for-1)`,
      sharesHeld,
    };
  }
}

function noSharesHeld(symbol: string, date: IsoDate) {
  return analysisError('no_shares_held', `No shares of ${symbol} held on ${date} to apply the event to.`);
}
