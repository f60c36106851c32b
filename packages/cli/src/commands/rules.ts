/**
 * Rules command: print the active keyword table
 */

import { parseCliOptions } from '../cli.js';
import { loadConfig } from '../config/index.js';
import { withErrorHandling } from '../errors/index.js';
import { ProgressReporter } from '../progress/index.js';

export const rulesCommand = withErrorHandling(
  async (rawOptions: Record<string, unknown>): Promise<void> => {
    const options = parseCliOptions(rawOptions);
    const reporter = new ProgressReporter({ color: !options.noColor });

    const config = await loadConfig(options);
    reporter.printRules(config.rules);
  },
);
