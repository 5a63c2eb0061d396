import { Text } from "react-native";
import type { StyleProp, TextStyle } from "react-native";
import { glyphFor } from "../theme/icons";
import type { IconName } from "../theme/icons";
import { colors } from "../theme/colors";

export function Icon({
  name,
  size,
  color = colors.textSecondary,
  style,
  testID,
}: {
  name: IconName;
  size: number;
  color?: string;
  style?: StyleProp<TextStyle>;
  testID?: string;
}) {
  return (
    <Text
      testID={testID}
      accessibilityLabel={name}
      style={[{ fontSize: size, lineHeight: Math.round(size * 1.2), color }, style]}
    >
      {glyphFor(name)}
    </Text>
  );
}
