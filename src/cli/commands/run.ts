/**
 * `voxgrid run "grid" "refine 45" "5"`: feed utterances through the
 * dispatch pipeline against a recording backend and print what would have
 * been sent to the keyboard and mouse.
 */

import { Command } from 'commander';
import { resolve } from 'path';
import { ConfigManager } from '../../core/config.js';
import { describeAction, RecordingBackend } from '../../capabilities/recording.js';
import { createRuntime } from '../../pipeline/runtime.js';
import type { UtteranceOutcome } from '../../pipeline/dictation.js';
import { applyLogging } from '../logging.js';

interface RunOptions {
  dir: string;
  typeUnmatched?: boolean;
  json?: boolean;
}

interface UtteranceReport {
  utterance: string;
  outcome: UtteranceOutcome;
  actions: string[];
  overlay: string | null;
}

export function createRunCommand(): Command {
  const cmd = new Command('run');

  cmd
    .description('Dispatch utterances and print the resulting input actions')
    .argument('<utterances...>', 'Utterances, processed in order')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .option('--type-unmatched', 'Type utterances that match no command')
    .option('--json', 'Output results as JSON')
    .action(async (utterances: string[], options: RunOptions, command: Command) => {
      await executeRun(utterances, options, command);
    });

  return cmd;
}

async function executeRun(utterances: string[], options: RunOptions, command: Command): Promise<void> {
  const projectDir = resolve(options.dir);
  const overrides = options.typeUnmatched ? { textProcessing: { commandOnlyMode: false } } : undefined;
  const config = new ConfigManager(projectDir).load(overrides);
  applyLogging(config, command);

  const backend = new RecordingBackend(config.screen);
  const runtime = createRuntime(config, {
    keyboard: backend.keyboard,
    mouse: backend.mouse,
    system: backend.system,
  });

  const reports: UtteranceReport[] = [];
  try {
    for (const utterance of utterances) {
      const outcome = runtime.session.processText(utterance);
      await runtime.flush();
      reports.push({
        utterance,
        outcome,
        actions: backend.drain().map(describeAction),
        overlay: runtime.overlays.currentKind(),
      });
    }
  } finally {
    await runtime.dispose();
  }

  if (options.json) {
    console.log(JSON.stringify(reports, null, 2));
    return;
  }

  for (const report of reports) {
    console.log(`› ${report.utterance}  [${formatOutcome(report.outcome)}]`);
    for (const action of report.actions) {
      console.log(`    ${action}`);
    }
    if (report.overlay) {
      console.log(`    overlay: ${report.overlay}`);
    }
  }
}

function formatOutcome(outcome: UtteranceOutcome): string {
  switch (outcome.kind) {
    case 'ignored':
      return 'ignored';
    case 'command_word':
      return `command word: ${outcome.action}`;
    case 'command':
      return outcome.output === null ? 'command' : `command → ${JSON.stringify(outcome.output)}`;
    case 'typed':
      return `typed ${JSON.stringify(outcome.text)}`;
    case 'unmatched':
      return 'no match';
    case 'error':
      return `error: ${outcome.error}`;
  }
}
