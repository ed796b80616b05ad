/**
 * Commander program assembly
 *
 * Command modules register themselves in commandRegistry when imported;
 * registerXCommands adds the Commander flags and wires them to the registry.
 */

import { Command } from 'commander';
import { commandRegistry } from './core/command-registry.js';
import { registerSweepCommands } from './commands/sweep.js';

export const CLI_VERSION = '0.1.0';

export function createProgram(): Command {
  const program = new Command();
  program
    .name('perfsweep')
    .description('Sweep build-time concurrency and run modes under a hardware counter sampler')
    .version(CLI_VERSION);

  registerSweepCommands(program);

  for (const pkg of commandRegistry.getPackages()) {
    const pkgCmd = program.commands.find((cmd) => cmd.name() === pkg.packageName);
    pkgCmd?.addHelpText('after', `\n${commandRegistry.generatePackageHelp(pkg.packageName)}`);
  }

  program.configureOutput({
    writeErr: (str) => {
      process.stderr.write(str);
    },
  });

  return program;
}
