// Settlement day types
export const SLOTS_PER_DAY = 48;
export const SLOT_MINUTES = 30;
export const SLOT_HOURS = SLOT_MINUTES / 60;

/**
 * Raw time-series reading as delivered by a feed, before it is aligned to slots.
 */
export interface RawReading {
  timestamp: string | Date;
  value: number;
}

/** Carbon intensity band as published alongside the gCO2/kWh figure */
export type CarbonIndex = 'very low' | 'low' | 'moderate' | 'high' | 'very high';

export interface CarbonReading extends RawReading {
  index?: CarbonIndex;
}

/**
 * Wind and solar share (percent of GB generation) for one half hour
 */
export interface GenerationMixReading {
  timestamp: string | Date;
  windShare: number;
  solarShare: number;
}

export interface SettlementSlot {
  index: number;
  /** Slot start as an ISO string in the day's zone */
  start: string;
  price: number;
  carbonIntensity: number;
  carbonIndex: CarbonIndex | null;
  /** null when no generation mix was published for the day */
  windShare: number | null;
  solarShare: number | null;
}

export interface GridDay {
  date: string;
  zone: string;
  slots: SettlementSlot[];
}

// Flexible load types
export type LoadKind = 'ev' | 'heat_pump' | 'generic';

/**
 * Inclusive slot range. When start > end the window wraps past midnight
 * (start..47 followed by 0..end).
 */
export interface SlotWindow {
  start: number;
  end: number;
}

export interface FlexibleLoad {
  id: string;
  kind: LoadKind;
  totalEnergyRequired: number;
  allowedWindow: SlotWindow;
  maxPowerPerSlot: number;
}

// Scheduling types
export type OptimizationGoal = 'cheapest' | 'lowest_carbon' | 'balanced';

export type BaselineStrategy = 'uniform' | 'asap';

export interface ScheduleOptions {
  /** Price weight in [0, 1]; carbon receives 1 - weight */
  weight?: number;
  baseline?: BaselineStrategy;
}

export interface ScheduleMetrics {
  energy: number;
  cost: number;
  carbon: number;
}

export interface Savings {
  cost: number;
  carbon: number;
  costPercent: number;
  carbonPercent: number;
}

export interface ScheduleResult {
  loadId: string;
  kind: LoadKind;
  weight: number;
  baselineStrategy: BaselineStrategy;
  allocation: number[];
  baselineAllocation: number[];
  baseline: ScheduleMetrics;
  optimized: ScheduleMetrics;
  savings: Savings;
}

export interface PortfolioTotals {
  baseline: ScheduleMetrics;
  optimized: ScheduleMetrics;
  savings: Savings;
}

export interface PortfolioResult {
  results: ScheduleResult[];
  totals: PortfolioTotals;
}

// Demo scenario types
export interface EvScenario {
  arrival: string;
  departure: string;
  energyKwh: number;
  chargerKw?: number;
}

export interface HeatPumpScenario {
  /** Daily thermal demand; estimated from the month when omitted */
  heatDemandKwh?: number;
  cop?: number;
  allowedFrom: string;
  allowedUntil: string;
  ratedKw?: number;
}

export interface DemoScenario {
  goal?: OptimizationGoal;
  baseline?: BaselineStrategy;
  ev?: EvScenario;
  heatPump?: HeatPumpScenario;
}

export interface ScenarioReport {
  gridDay: GridDay;
  goal: OptimizationGoal;
  loads: FlexibleLoad[];
  results: ScheduleResult[];
  totals: PortfolioTotals;
  household: number[];
  /** Wind plus solar share per slot; null where no mix was published */
  renewableShare: Array<number | null>;
}
