import { useMemo, useState } from "react";
import { ScrollView, Text, View, Pressable, StyleSheet } from "react-native";
import { ChartLegend } from "../components/ChartLegend";
import { ChartExplanation } from "../components/ChartExplanation";
import { ChartTooltip } from "../components/ChartTooltip";
import { CHART_KINDS, getLegend } from "../lib/legends";
import { CHART_TYPES } from "../lib/chartTypes";
import { candlestickTooltip, pnlTooltip, priceTooltip } from "../lib/tooltips";
import type { TooltipData } from "../lib/tooltips";
import { colors } from "../theme/colors";
import { spacing } from "../theme/spacing";
import { type } from "../theme/typography";

const SAMPLE_TS = new Date(2024, 0, 5, 14, 30);

const sampleTooltips: Array<{ name: string; data: TooltipData }> = [
  {
    name: "Candle",
    data: candlestickTooltip({ openTime: SAMPLE_TS, open: 45000, high: 46000, low: 44500, close: 45500, volume: 1_250_000 }),
  },
  { name: "P&L", data: pnlTooltip(10_500, SAMPLE_TS, 250) },
  { name: "Price", data: priceTooltip(45_000, SAMPLE_TS, -120) },
];

export function ChartLegendScreen() {
  const [tooltipIdx, setTooltipIdx] = useState<number | null>(0);
  const tooltip = useMemo(() => (tooltipIdx == null ? null : sampleTooltips[tooltipIdx]), [tooltipIdx]);

  return (
    <ScrollView contentContainerStyle={styles.scrollContent}>
      <Text style={styles.h1}>Chart Legends</Text>
      {CHART_KINDS.map((kind) => (
        <ChartLegend key={kind} legend={getLegend(kind)} />
      ))}

      <Text style={styles.h2}>Explanations</Text>
      {CHART_TYPES.map((chart, i) => (
        <ChartExplanation key={chart} chart={chart} compact={i >= 2} />
      ))}

      <Text style={styles.h2}>Tooltips</Text>
      <View style={styles.chipRow}>
        {sampleTooltips.map((t, i) => (
          <Pressable
            key={t.name}
            onPress={() => setTooltipIdx(tooltipIdx === i ? null : i)}
            style={[styles.chip, tooltipIdx === i && styles.chipEm]}
          >
            <Text style={[styles.chipText, tooltipIdx === i && styles.chipTextEm]}>{t.name}</Text>
          </Pressable>
        ))}
      </View>
      <View style={styles.tooltipStage}>
        {tooltip ? <ChartTooltip data={tooltip.data} position={{ x: 24, y: 16 }} visible /> : null}
      </View>
    </ScrollView>
  );
}

const styles = StyleSheet.create({
  scrollContent: {
    paddingBottom: 120,
    gap: spacing.md,
    paddingHorizontal: spacing.md,
    paddingTop: spacing.lg,
  },
  h1: {
    color: colors.textPrimary,
    fontSize: type.h1,
    fontWeight: "700",
    letterSpacing: 0.2,
  },
  h2: {
    color: colors.textPrimary,
    fontSize: type.h2,
    fontWeight: "700",
    marginTop: spacing.sm,
  },
  chipRow: { flexDirection: "row", gap: spacing.sm },
  chip: {
    paddingHorizontal: 12,
    paddingVertical: 6,
    borderRadius: 999,
    borderWidth: 1,
    borderColor: colors.surfaceBorderStrong,
  },
  chipEm: { backgroundColor: colors.accent, borderColor: colors.accent },
  chipText: { color: colors.textSecondary, fontWeight: "600", fontSize: type.caption },
  chipTextEm: { color: "#FFFFFF" },
  tooltipStage: {
    height: 170,
    borderRadius: 12,
    backgroundColor: colors.surfaceMuted,
  },
});
