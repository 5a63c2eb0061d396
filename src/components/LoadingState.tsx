import { ActivityIndicator, Text, View, StyleSheet } from "react-native";
import { colors } from "../theme/colors";
import { type } from "../theme/typography";

export function LoadingState({ message }: { message: string }) {
  return (
    <View style={styles.wrap} accessibilityLabel={message}>
      <ActivityIndicator size="small" color={colors.textSecondary} />
      <Text style={styles.message}>{message}</Text>
    </View>
  );
}

const styles = StyleSheet.create({
  wrap: {
    flexDirection: "row",
    alignItems: "center",
    gap: 12,
  },
  message: {
    color: colors.textSecondary,
    fontSize: type.subheadline,
  },
});
