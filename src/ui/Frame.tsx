import type React from "react";
import { Box, Text } from "ink";
import type { SessionView } from "../session/types";
import { renderFrame } from "./layout";
import type { FrameContext, Theme } from "./types";

export interface FrameProps {
  view: SessionView;
  theme: Theme;
  context: FrameContext;
}

/**
 * One screen of the session: every laid-out row becomes a line of styled
 * ink text.
 */
export const Frame: React.FC<FrameProps> = ({ view, theme, context }) => {
  const rows = renderFrame(view, context);

  return (
    <Box flexDirection="column">
      {rows.map((row, i) => (
        <Text key={i} wrap="truncate-end">
          {row.length === 0
            ? " "
            : row.map((segment, j) => (
                <Text key={j} {...theme.styles[segment.role]}>
                  {segment.text}
                </Text>
              ))}
        </Text>
      ))}
    </Box>
  );
};
