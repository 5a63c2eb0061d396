import { useMemo, useState } from "react";
import { ScrollView, Text, View, StyleSheet } from "react-native";
import Card from "../components/Card";
import { EmptyState } from "../components/EmptyState";
import { SegmentedPicker } from "../components/SegmentedPicker";
import { clampIndex, illustrationSamples } from "../lib/previews";
import { colors } from "../theme/colors";
import { spacing } from "../theme/spacing";
import { type } from "../theme/typography";

const sampleNames = illustrationSamples.map((s) => s.name);

/** Picker-driven harness that renders each illustrated empty state in turn. */
export function EmptyStatePreviewScreen({ initialIndex = 0 }: { initialIndex?: number }) {
  const [selected, setSelected] = useState(() => clampIndex(initialIndex, illustrationSamples.length));
  const [notice, setNotice] = useState<string | null>(null);

  const sample = illustrationSamples[clampIndex(selected, illustrationSamples.length)];
  const content = useMemo(() => sample.content(setNotice), [sample]);

  return (
    <ScrollView contentContainerStyle={styles.scrollContent}>
      <Text style={styles.h1}>Empty State Illustrations</Text>
      <SegmentedPicker
        options={sampleNames}
        selected={selected}
        onSelect={(i) => {
          setSelected(clampIndex(i, illustrationSamples.length));
          setNotice(null);
        }}
      />

      <View style={styles.stage}>
        <EmptyState content={content} illustrated />
      </View>

      <Card variant="muted" style={styles.info}>
        <Text style={styles.infoTitle}>Current: {sample.name}</Text>
        <Text style={styles.infoMeta}>Icon: {content.icon}</Text>
        <Text style={styles.infoMeta}>Features: illustration rings, glyph icon, optional action</Text>
        {notice ? <Text style={styles.notice}>{notice}</Text> : null}
      </Card>
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
    fontSize: type.h2,
    fontWeight: "700",
    textAlign: "center",
  },
  stage: {
    height: 300,
    justifyContent: "center",
    backgroundColor: colors.surfaceMuted,
    borderRadius: 12,
  },
  info: {
    alignItems: "center",
    gap: spacing.sm,
  },
  infoTitle: {
    color: colors.textPrimary,
    fontSize: type.headline,
    fontWeight: "600",
  },
  infoMeta: {
    color: colors.textSecondary,
    fontSize: type.caption,
    textAlign: "center",
  },
  notice: {
    color: colors.accent,
    fontSize: type.caption,
    fontWeight: "600",
  },
});
