import type { IconName } from "../theme/icons";
import { emptyState } from "./emptyStates";
import type { EmptyStateContent, EmptyStateKind } from "./emptyStates";

export type IllustrationSample = {
  name: string;
  kind: EmptyStateKind;
  content: (onAction: (message: string) => void) => EmptyStateContent;
};

export const illustrationSamples: readonly IllustrationSample[] = [
  {
    name: "Chart",
    kind: "chart",
    content: () =>
      emptyState("chart", {
        description: "Market data is loading or temporarily unavailable. Check your connection and try again.",
      }),
  },
  {
    name: "P&L",
    kind: "pnl",
    content: (onAction) =>
      emptyState("pnl", {
        description: "Start trading to see your performance metrics and profit & loss charts here.",
        action: { title: "Start Trading", onPress: () => onAction("Start Trading tapped") },
      }),
  },
  {
    name: "Trades",
    kind: "trades",
    content: () =>
      emptyState("trades", {
        description: "Your trading history will appear here once you start placing orders.",
      }),
  },
  {
    name: "Strategies",
    kind: "strategies",
    content: () =>
      emptyState("strategies", {
        description: "AI trading strategies will appear here when they're loaded and ready to use.",
      }),
  },
  {
    name: "AI Signal",
    kind: "signal",
    content: () => emptyState("signal"),
  },
];

export function clampIndex(index: number, length: number) {
  if (length <= 0) return 0;
  if (!Number.isFinite(index)) return 0;
  return Math.min(length - 1, Math.max(0, Math.trunc(index)));
}

export type AppTab = "dashboard" | "trades" | "pnl" | "strategies" | "settings";

export const appTabs: ReadonlyArray<{ tab: AppTab; title: string; icon: IconName }> = [
  { tab: "dashboard", title: "Dashboard", icon: "chart.line.uptrend.xyaxis" },
  { tab: "trades", title: "Trades", icon: "list.bullet.rectangle" },
  { tab: "pnl", title: "P&L", icon: "dollarsign.circle" },
  { tab: "strategies", title: "Strategies", icon: "brain" },
  { tab: "settings", title: "Settings", icon: "gearshape" },
];
