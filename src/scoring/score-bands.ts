import tables from './scoring-tables.json';

/**
 * Band of a threshold table. Every bound present must hold; a band with no
 * bounds matches anything and closes the table.
 */
export interface BandCondition {
  gt?: number;
  gte?: number;
  lt?: number;
  lte?: number;
}

export interface ScoreBand extends BandCondition {
  points: number;
}

export interface RiskCategoryBand extends BandCondition {
  category: string;
  description: string;
}

export interface GradeBand extends BandCondition {
  grade: string;
  gradePoints: number;
  description: string;
  tier: string;
  recommendation: string;
}

export interface PositionSizeRule {
  minRiskScore: number;
  performanceAbove?: number;
  size: string;
  percentageOfPortfolio: string;
  rationale: string;
}

export interface PortfolioGradeRule {
  returnAbove?: number;
  volatilityBelow?: number;
  sharpeAbove?: number;
  grade: string;
  description: string;
}

export interface ScoringTables {
  riskScore: {
    base: number;
    min: number;
    max: number;
    components: {
      volatility: ScoreBand[];
      sharpeRatio: ScoreBand[];
      maxDrawdown: ScoreBand[];
      sortinoRatio: ScoreBand[];
      beta: ScoreBand[];
      momentum6m: ScoreBand[];
      annualReturn: ScoreBand[];
    };
    categories: RiskCategoryBand[];
  };
  grade: {
    components: {
      annualReturn: ScoreBand[];
      sharpeRatio: ScoreBand[];
      volatility: ScoreBand[];
      maxDrawdown: ScoreBand[];
      sortinoRatio: ScoreBand[];
    };
    cutoffs: GradeBand[];
  };
  positionSize: PositionSizeRule[];
  portfolioGrade: PortfolioGradeRule[];
}

export function bandMatches(band: BandCondition, value: number): boolean {
  return (
    (band.gt === undefined || value > band.gt) &&
    (band.gte === undefined || value >= band.gte) &&
    (band.lt === undefined || value < band.lt) &&
    (band.lte === undefined || value <= band.lte)
  );
}

/** First band containing `value`. Tables end with an unbounded band, so a match always exists. */
export function matchBand<T extends BandCondition>(bands: readonly T[], value: number): T {
  const band = bands.find((candidate) => bandMatches(candidate, value));
  if (band === undefined) {
    throw new Error(`Threshold table has no band for ${value}`);
  }
  return band;
}

export function bandPoints(bands: readonly ScoreBand[], value: number): number {
  return matchBand(bands, value).points;
}

function isCatchAll(band: BandCondition): boolean {
  return band.gt === undefined && band.gte === undefined && band.lt === undefined && band.lte === undefined;
}

/** Rejects tables whose last band is bounded. Runs once at load. */
export function assertClosedTables(scoring: ScoringTables): ScoringTables {
  const bandTables: Array<[string, readonly BandCondition[]]> = [
    ...Object.entries(scoring.riskScore.components),
    ['riskScore.categories', scoring.riskScore.categories],
    ...Object.entries(scoring.grade.components),
    ['grade.cutoffs', scoring.grade.cutoffs],
  ];
  for (const [name, bands] of bandTables) {
    const last = bands[bands.length - 1];
    if (last === undefined || !isCatchAll(last)) {
      throw new Error(`Scoring table "${name}" must end with an unbounded band`);
    }
  }
  return scoring;
}

export const SCORING_TABLES: ScoringTables = assertClosedTables(tables);
