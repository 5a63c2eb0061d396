import { withOpacity } from "../theme/colors";
import type { ColorValue } from "../theme/colors";
import type { IconName } from "../theme/icons";

export const CHART_KINDS = ["candlestick", "pnl", "price"] as const;
export type ChartKind = (typeof CHART_KINDS)[number];

export type LegendIndicator =
  | { readonly kind: "color"; readonly color: ColorValue }
  | { readonly kind: "icon"; readonly icon: IconName };

export type LegendEntry = {
  readonly id: string;
  readonly label: string;
  readonly indicator: LegendIndicator;
};

export type LegendSet = {
  readonly title?: string;
  readonly entries: readonly LegendEntry[];
};

export class LegendNotFoundError extends Error {
  readonly key: string;

  constructor(key: string) {
    super(`No legend registered for chart kind "${key}"`);
    this.name = "LegendNotFoundError";
    this.key = key;
  }
}

let entrySeq = 0;

function makeEntry(label: string, indicator: LegendIndicator): LegendEntry {
  if (!label.trim()) throw new RangeError("Legend entry label must not be empty");
  entrySeq += 1;
  return Object.freeze({ id: `legend-entry-${entrySeq}`, label, indicator: Object.freeze(indicator) });
}

export function colorEntry(label: string, color: ColorValue): LegendEntry {
  return makeEntry(label, { kind: "color", color });
}

export function iconEntry(label: string, icon: IconName): LegendEntry {
  return makeEntry(label, { kind: "icon", icon });
}

function legendSet(title: string | undefined, entries: LegendEntry[]): LegendSet {
  return Object.freeze({ title, entries: Object.freeze(entries) });
}

export const EMPTY_LEGEND: LegendSet = legendSet(undefined, []);

const registry: Readonly<Record<ChartKind, LegendSet>> = Object.freeze({
  candlestick: legendSet("Chart Legend", [
    colorEntry("Bullish Candle", "green"),
    colorEntry("Bearish Candle", "red"),
    colorEntry("Volume", withOpacity("blue", 0.6)),
    iconEntry("Price Range", "arrow.up.arrow.down"),
  ]),
  pnl: legendSet("Profit & Loss Chart", [
    colorEntry("Profit", "green"),
    colorEntry("Loss", "red"),
    iconEntry("Equity Over Time", "chart.line.uptrend.xyaxis"),
    colorEntry("Break Even", "secondary"),
  ]),
  price: legendSet("Price Chart", [
    colorEntry("Price Movement", "blue"),
    iconEntry("Current Price", "circle.fill"),
    iconEntry("Time Period", "clock"),
    iconEntry("Price Trend", "arrow.up.right"),
  ]),
});

export function getLegend(kind: ChartKind): LegendSet {
  return registry[kind];
}

export function isChartKind(value: string): value is ChartKind {
  return CHART_KINDS.some((kind) => kind === value);
}

/** String-keyed lookup for callers holding an unchecked chart kind. */
export function findLegend(key: string): LegendSet {
  if (!isChartKind(key)) throw new LegendNotFoundError(key);
  return registry[key];
}

export function legendOrEmpty(key: string): LegendSet {
  try {
    return findLegend(key);
  } catch (e) {
    if (!(e instanceof LegendNotFoundError)) throw e;
    console.warn(`[Legend] ${e.message}, showing an empty legend`);
    return EMPTY_LEGEND;
  }
}
