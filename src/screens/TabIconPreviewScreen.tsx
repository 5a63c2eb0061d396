import { useState } from "react";
import { ScrollView, Text, View, StyleSheet } from "react-native";
import Card from "../components/Card";
import { Icon } from "../components/Icon";
import { SegmentedPicker } from "../components/SegmentedPicker";
import { appTabs, clampIndex } from "../lib/previews";
import { colors } from "../theme/colors";
import { spacing } from "../theme/spacing";
import { iconSize, type } from "../theme/typography";
import { columnsToSpan, spanToPercent, useResponsiveSpan } from "../theme/grid";

const tabTitles = appTabs.map((t) => t.title);

export function TabIconPreviewScreen() {
  const [selected, setSelected] = useState(0);
  const tab = appTabs[clampIndex(selected, appTabs.length)];
  // three columns on phones, five on wider screens
  const span = useResponsiveSpan({ sm: columnsToSpan(3), md: columnsToSpan(5), lg: columnsToSpan(5) });

  return (
    <ScrollView contentContainerStyle={styles.scrollContent}>
      <Text style={styles.h1}>Tab Icons Preview</Text>
      <Text style={styles.caption}>Each tab with its icon in the normal and selected states</Text>

      <SegmentedPicker options={tabTitles} selected={selected} onSelect={setSelected} />

      <Card style={styles.hero}>
        <Icon name={tab.icon} size={iconSize.hero} color={colors.textPrimary} />
        <Text style={styles.heroTitle}>{tab.title}</Text>
        <Text style={styles.caption}>Icon: {tab.icon}</Text>
        <View style={styles.statesRow}>
          <View style={styles.stateCell}>
            <Icon name={tab.icon} size={iconSize.tab} color={colors.neutral} />
            <Text style={styles.stateLabel}>Normal</Text>
          </View>
          <View style={styles.stateCell}>
            <Icon name={tab.icon} size={iconSize.tab} color={colors.accent} />
            <Text style={styles.stateLabel}>Selected</Text>
          </View>
        </View>
      </Card>

      <View style={styles.grid}>
        {appTabs.map((t) => (
          <View key={t.tab} style={[styles.gridCell, { width: spanToPercent(span) }]}>
            <Card variant="muted" style={styles.gridCard}>
              <Icon name={t.icon} size={iconSize.grid} color={colors.textPrimary} />
              <Text style={styles.gridLabel}>{t.title}</Text>
            </Card>
          </View>
        ))}
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
    fontSize: type.h2,
    fontWeight: "600",
    textAlign: "center",
  },
  caption: {
    color: colors.textSecondary,
    fontSize: type.caption,
    textAlign: "center",
  },
  hero: {
    alignItems: "center",
    gap: spacing.sm,
    paddingVertical: spacing.lg,
  },
  heroTitle: {
    color: colors.textPrimary,
    fontSize: type.headline,
    fontWeight: "600",
  },
  statesRow: {
    flexDirection: "row",
    gap: 20,
    padding: spacing.md,
    backgroundColor: colors.surfaceMuted,
    borderRadius: 8,
  },
  stateCell: { alignItems: "center", gap: 4 },
  stateLabel: { color: colors.textSecondary, fontSize: type.caption2 },
  grid: {
    flexDirection: "row",
    flexWrap: "wrap",
    marginHorizontal: -spacing.xs,
  },
  gridCell: { padding: spacing.xs },
  gridCard: { alignItems: "center", gap: spacing.sm, paddingVertical: spacing.md },
  gridLabel: { color: colors.textPrimary, fontSize: type.caption, textAlign: "center" },
});
