import { Injectable } from '@nestjs/common';
import sectorMap from './sector-map.json';
import { SectorInfo, SectorInfoProvider } from './interfaces/market-data-provider.interface';

const SECTORS: Readonly<Record<string, SectorInfo>> = sectorMap;

// Sector metadata from a bundled table. Unlisted symbols reject like a failed vendor call.
@Injectable()
export class StaticSectorInfoProvider implements SectorInfoProvider {
  async lookup(symbol: string): Promise<SectorInfo> {
    const info = SECTORS[symbol.replace(/\.IS$/, '')];
    if (!info) {
      throw new Error(`No sector data for ${symbol}`);
    }
    return { ...info };
  }
}
