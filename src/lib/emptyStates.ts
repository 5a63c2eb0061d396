import type { IconName } from "../theme/icons";

export type EmptyStateKind = "chart" | "pnl" | "trades" | "strategies" | "signal";

export type EmptyStateAction = {
  title: string;
  onPress: () => void;
};

export type EmptyStateContent = {
  icon: IconName;
  title: string;
  description: string;
  action?: EmptyStateAction;
};

export type EmptyStateOverrides = Partial<Pick<EmptyStateContent, "title" | "description" | "action">>;

const presets: Record<EmptyStateKind, EmptyStateContent> = {
  chart: {
    icon: "chart.line.uptrend.xyaxis",
    title: "No Chart Data",
    description: "Market data is loading or unavailable",
  },
  pnl: {
    icon: "dollarsign.circle",
    title: "No Trading Data",
    description: "Start trading to see performance here",
  },
  trades: {
    icon: "list.bullet.rectangle",
    title: "No Trades Yet",
    description: "Start trading to see performance here",
  },
  strategies: {
    icon: "brain.head.profile",
    title: "No Strategies Available",
    description: "Trading strategies will appear here when loaded",
  },
  signal: {
    icon: "antenna.radiowaves.left.and.right",
    title: "No Signal Available",
    description: "The AI is analyzing market conditions. No clear trading signal at the moment.",
  },
};

export function emptyState(kind: EmptyStateKind, overrides: EmptyStateOverrides = {}): EmptyStateContent {
  const base = presets[kind];
  return {
    icon: base.icon,
    title: overrides.title ?? base.title,
    description: overrides.description ?? base.description,
    action: overrides.action ?? base.action,
  };
}

export function emptyStateAccessibilityLabel({ title, description }: Pick<EmptyStateContent, "title" | "description">) {
  return `${title}. ${description}`;
}
