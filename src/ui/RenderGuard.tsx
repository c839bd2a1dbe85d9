import React from "react";
import { Text } from "ink";
import { CodetypeError } from "../errors";
import type { Logger } from "../logger";

interface RenderGuardProps {
  logger: Logger;
  /** A new value retries a failed render */
  resetKey: number;
  children?: React.ReactNode;
}

interface RenderGuardState {
  failed: boolean;
}

/**
 * Error boundary around the frame. A failed render is logged and leaves a
 * blank screen until the next change; the session keeps running.
 */
export class RenderGuard extends React.Component<RenderGuardProps, RenderGuardState> {
  state: RenderGuardState = { failed: false };
  private failures = 0;

  static getDerivedStateFromError(): RenderGuardState {
    return { failed: true };
  }

  componentDidCatch(error: Error): void {
    this.failures++;
    const failure = new CodetypeError("RenderFailure", "failed to draw frame", { cause: error });
    this.props.logger.debug(failure.message, { failures: this.failures, error: error.message });
  }

  componentDidUpdate(previous: RenderGuardProps): void {
    if (this.state.failed && previous.resetKey !== this.props.resetKey) {
      this.setState({ failed: false });
    }
  }

  render(): React.ReactNode {
    return this.state.failed ? <Text> </Text> : this.props.children;
  }
}
