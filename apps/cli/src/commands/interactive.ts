/**
 * Interactive Command
 *
 * The persistent terminal session: wires the controller to the keyboard,
 * redraws on every change and on a timer while compressing.
 */

import { locateEncoder, type AcceleratorMode } from '@tinythis/core';
import { JobQueue } from '@tinythis/processing';
import { createLogger } from '@tinythis/utils';
import { encoderLocateOptions, saveConfig, type CliConfig } from '../config/index.js';
import { SessionController } from '../session/controller.js';
import { renderSession } from '../session/render.js';
import { Terminal, keyToEvent } from '../session/terminal.js';
import { EXIT_CODES, type ExitCode } from './compress.js';

const log = createLogger({ module: 'interactive' });

const REDRAW_INTERVAL_MS = 250;

export function interactiveCommand(config: CliConfig, acceleratorMode: AcceleratorMode): Promise<ExitCode> {
  const settings = { preset: config.defaultPreset, acceleratorMode };
  const locate = encoderLocateOptions(config);
  const queue = new JobQueue({
    locateEncoder: () => locateEncoder(locate),
    cancelGraceMs: config.env.TINYTHIS_CANCEL_GRACE_MS,
    defaults: settings,
  });

  const terminal = new Terminal();
  const session = new SessionController({
    queue,
    ...settings,
    selectFiles: () => terminal.promptPaths('Files to add (paste or drop, space separated): '),
    persistAccelerator: mode => {
      saveConfig(config.configDir, { gpu: mode === 'gpu' });
    },
  });

  const redraw = (): void => {
    terminal.draw(renderSession(session.tick()));
  };

  return new Promise(resolve => {
    const timer = setInterval(() => {
      if (session.getState().mode === 'compressing') redraw();
    }, REDRAW_INTERVAL_MS);

    session.on('change', redraw);
    session.once('quit', () => {
      clearInterval(timer);
      session.off('change', redraw);
      terminal.leave();
      resolve(EXIT_CODES.OK);
    });

    terminal.onKey((str, key) => {
      const event = keyToEvent(str, key);
      if (!event) return;
      session.dispatch(event).catch((error: unknown) => {
        log.error({ error, event }, 'Session event failed');
      });
    });

    terminal.enter();
    redraw();
  });
}
