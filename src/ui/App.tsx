import type React from "react";
import { useEffect, useState } from "react";
import { useApp, useInput } from "ink";
import type { Logger } from "../logger";
import { silentLogger } from "../logger";
import type { RoundController } from "../runner/controller";
import { DEFAULT_TICK_MS } from "../runner/types";
import { Frame } from "./Frame";
import { toKeyEvents } from "./input";
import { RenderGuard } from "./RenderGuard";
import type { Theme } from "./types";
import { useTerminalSize } from "./useTerminalSize";

export interface AppProps {
  controller: RoundController;
  theme: Theme;
  logger?: Logger;
  /** Milliseconds between timer ticks */
  tickMs?: number;
}

/**
 * Root ink component: forwards keys and ticks to the controller, redraws
 * on every change it announces and exits once it is done.
 */
export const App: React.FC<AppProps> = ({
  controller,
  theme,
  logger = silentLogger,
  tickMs = DEFAULT_TICK_MS,
}) => {
  const { exit } = useApp();
  const size = useTerminalSize();
  const [revision, setRevision] = useState(0);

  useEffect(() => {
    const onChange = () => {
      if (!controller.isDone) {
        setRevision((current) => current + 1);
        return;
      }
      const failure = controller.failure;
      if (failure) {
        exit(failure);
      } else {
        exit();
      }
    };

    const unsubscribe = controller.subscribe(onChange);
    if (controller.isDone) onChange();
    return unsubscribe;
  }, [controller, exit]);

  useEffect(() => {
    controller.start();
    const timer = setInterval(() => controller.tick(), tickMs);
    return () => clearInterval(timer);
  }, [controller, tickMs]);

  useInput((input, key) => {
    controller.handleKeys(toKeyEvents(input, key));
  });

  return (
    <RenderGuard logger={logger} resetKey={revision}>
      <Frame
        view={controller.view()}
        theme={theme}
        context={{ size, filePath: controller.filePath, limits: controller.limits() }}
      />
    </RenderGuard>
  );
};
