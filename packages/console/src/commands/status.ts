/**
 * ordinance status — show the loaded groups, users, accesses and plugins
 */

import { Command } from 'commander';
import { describeStatus, renderStatus } from '../tui/output/status.js';
import { t } from '../tui/theme.js';
import { guarded, runtimeFor } from './shared.js';

export const statusCommand = new Command('status')
  .description('Show groups, users, accesses and plugins as loaded from the rules file')
  .option('--json', 'Output as JSON')
  .action(guarded((options: { json?: boolean }, command: Command) => {
    const runtime = runtimeFor(command);

    if (options.json === true) {
      console.log(JSON.stringify({ home: runtime.home, ...describeStatus(runtime) }, null, 2));
      return;
    }
    console.log('\n  ' + t.muted('home') + '        ' + t.text(runtime.home));
    console.log('  ' + t.muted('rules file') + '  ' + t.text(runtime.config.rulesFile));
    renderStatus(runtime);
  }));
