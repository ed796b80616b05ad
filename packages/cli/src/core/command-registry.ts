/**
 * Command Registry - handlers and schemas keyed by `<package>.<command>`
 *
 * Commander owns flags; the registry owns what a command validates against
 * and which handler runs it.
 */

import type { CommandDefinition, PackageCommandModule } from '../types/index.js';
import { ConfigurationError, NotFoundError, ValidationError } from '@perfsweep/utils';

export class CommandRegistry {
  private packages: Map<string, PackageCommandModule> = new Map();
  private commands: Map<string, CommandDefinition> = new Map();

  /**
   * Register a package command module
   *
   * @throws ConfigurationError on duplicate package or command names
   */
  registerPackage(module: PackageCommandModule): void {
    if (this.packages.has(module.packageName)) {
      throw new ConfigurationError(
        `Package ${module.packageName} is already registered`,
        'packageName',
        { packageName: module.packageName }
      );
    }

    for (const command of module.commands) {
      this.validateCommand(command);
      const fullName = `${module.packageName}.${command.name}`;
      if (this.commands.has(fullName)) {
        throw new ConfigurationError(`Command ${fullName} is already registered`, 'commandName', {
          packageName: module.packageName,
          commandName: command.name,
        });
      }
      this.commands.set(fullName, command);
    }
    this.packages.set(module.packageName, module);
  }

  getCommand(packageName: string, commandName: string): CommandDefinition | undefined {
    return this.commands.get(`${packageName}.${commandName}`);
  }

  /**
   * Like getCommand, but a missing command is an error
   */
  requireCommand(packageName: string, commandName: string): CommandDefinition {
    const command = this.getCommand(packageName, commandName);
    if (!command) {
      throw new NotFoundError('Command', `${packageName}.${commandName}`);
    }
    return command;
  }

  getPackages(): PackageCommandModule[] {
    return Array.from(this.packages.values());
  }

  /**
   * Help text for one package: its commands and their examples
   */
  generatePackageHelp(packageName: string): string {
    const module = this.packages.get(packageName);
    if (!module) {
      return `Package ${packageName} not found`;
    }

    const lines = [module.description, '', 'Commands:'];
    for (const command of module.commands) {
      lines.push(`  ${command.name.padEnd(12)} ${command.description}`);
      for (const example of command.examples ?? []) {
        lines.push(`    Example: ${example}`);
      }
    }
    return lines.join('\n');
  }

  validateCommand(command: CommandDefinition): void {
    if (!command.name.trim()) {
      throw new ValidationError('Command name must be a non-empty string', {
        command: command.name,
      });
    }
    if (!command.description.trim()) {
      throw new ValidationError('Command description must be a non-empty string', {
        command: command.name,
      });
    }
  }
}

/**
 * Global command registry instance
 */
export const commandRegistry = new CommandRegistry();
