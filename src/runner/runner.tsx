/**
 * Session Runner
 *
 * Hands the terminal to ink for the length of a run. The round logic lives
 * in RoundController; this class wires it to the terminal streams, keeps
 * console logging off the screen and watches the output for write errors.
 */

import { render } from "ink";
import type { Logger } from "../logger";
import { silentLogger } from "../logger";
import { App, watchOutput } from "../ui";
import { RoundController } from "./controller";
import type { RunnerOptions, RunResult } from "./types";

export class SessionRunner {
  private readonly options: RunnerOptions;
  private readonly logger: Logger;
  private readonly controller: RoundController;
  private running = false;

  /**
   * @throws CodetypeError EmptyFile when the excerpt has nothing to type
   */
  constructor(options: RunnerOptions) {
    this.options = options;
    this.logger = options.logger ?? silentLogger;
    this.controller = new RoundController({
      excerpt: options.excerpt,
      nextExcerpt: options.nextExcerpt,
      session: options.session,
      logger: this.logger,
    });
  }

  /**
   * Run rounds until the user quits. Resolves after ink has unmounted and
   * given the terminal back.
   */
  async run(): Promise<RunResult> {
    if (this.running) {
      throw new Error("Runner is already running");
    }
    this.running = true;

    const { input, output, theme, tickMs } = this.options;
    this.logger.suspendConsole();
    const unwatch = watchOutput(output, this.logger);

    try {
      const instance = render(
        <App controller={this.controller} theme={theme} logger={this.logger} tickMs={tickMs} />,
        { stdin: input, stdout: output, exitOnCtrlC: false, patchConsole: false }
      );
      await instance.waitUntilExit();
    } finally {
      unwatch();
      this.logger.resumeConsole();
      this.running = false;
    }

    return this.controller.result();
  }

  /**
   * Stop from outside (signal handlers). A running round is cancelled first
   * so its partial score is returned.
   */
  stop(reason: string): void {
    this.controller.stop(reason);
  }
}
