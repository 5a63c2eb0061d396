import { View, Text, Pressable, StyleSheet } from "react-native";
import { Icon } from "./Icon";
import { IllustrationRings } from "./IllustrationRings";
import { emptyStateAccessibilityLabel } from "../lib/emptyStates";
import type { EmptyStateContent } from "../lib/emptyStates";
import { colors } from "../theme/colors";
import { spacing } from "../theme/spacing";
import { iconSize, type } from "../theme/typography";

export function EmptyState({ content, illustrated = false }: { content: EmptyStateContent; illustrated?: boolean }) {
  const { icon, title, description, action } = content;
  const glyph = <Icon name={icon} size={iconSize.hero} />;

  return (
    <View style={styles.wrap} accessibilityLabel={emptyStateAccessibilityLabel(content)}>
      {illustrated ? <IllustrationRings>{glyph}</IllustrationRings> : glyph}
      <View style={styles.textBlock}>
        <Text style={styles.title}>{title}</Text>
        <Text style={styles.description} numberOfLines={3}>
          {description}
        </Text>
      </View>
      {action?.title ? (
        <Pressable accessibilityRole="button" onPress={action.onPress} style={styles.actionBtn}>
          <Text style={styles.actionText}>{action.title}</Text>
        </Pressable>
      ) : null}
    </View>
  );
}

const styles = StyleSheet.create({
  wrap: {
    alignItems: "center",
    justifyContent: "center",
    gap: spacing.md,
    padding: spacing.md,
    width: "100%",
  },
  textBlock: {
    alignItems: "center",
    gap: spacing.sm,
  },
  title: {
    color: colors.textPrimary,
    fontSize: type.headline,
    fontWeight: "600",
  },
  description: {
    color: colors.textSecondary,
    fontSize: type.body,
    textAlign: "center",
  },
  actionBtn: {
    backgroundColor: colors.accent,
    paddingHorizontal: spacing.md,
    paddingVertical: 10,
    borderRadius: 10,
  },
  actionText: {
    color: "#FFFFFF",
    fontWeight: "600",
  },
});
