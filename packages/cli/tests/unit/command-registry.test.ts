/**
 * Unit tests for Command Registry
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { z } from 'zod';
import { NotFoundError, ValidationError } from '@perfsweep/utils';
import { CommandRegistry, commandRegistry } from '../../src/core/command-registry.js';
import type { PackageCommandModule } from '../../src/types/index.js';
import '../../src/commands/sweep.js';

function moduleWith(names: string[], packageName = 'test'): PackageCommandModule {
  return {
    packageName,
    description: 'Test package',
    commands: names.map((name) => ({
      name,
      description: `${name} command`,
      schema: z.object({}),
      handler: async () => ({ ok: true }),
      examples: [`perfsweep ${packageName} ${name}`],
    })),
  };
}

describe('CommandRegistry', () => {
  let registry: CommandRegistry;

  beforeEach(() => {
    registry = new CommandRegistry();
  });

  it('registers packages and finds their commands', () => {
    registry.registerPackage(moduleWith(['run']));
    expect(registry.getPackages()).toHaveLength(1);
    expect(registry.getCommand('test', 'run')?.description).toBe('run command');
    expect(registry.getCommand('test', 'plan')).toBeUndefined();
  });

  it('rejects duplicate packages', () => {
    registry.registerPackage(moduleWith([]));
    expect(() => registry.registerPackage(moduleWith([]))).toThrow('Package test is already registered');
  });

  it('rejects duplicate commands within a package', () => {
    expect(() => registry.registerPackage(moduleWith(['run', 'run']))).toThrow(
      'Command test.run is already registered'
    );
  });

  it('rejects blank names', () => {
    expect(() => registry.registerPackage(moduleWith(['  ']))).toThrow(ValidationError);
  });

  it('throws NotFoundError from requireCommand', () => {
    expect(() => registry.requireCommand('test', 'nope')).toThrow(NotFoundError);
  });

  it('generates package help with examples', () => {
    registry.registerPackage(moduleWith(['run']));
    expect(registry.generatePackageHelp('test')).toBe(
      ['Test package', '', 'Commands:', '  run          run command', '    Example: perfsweep test run'].join('\n')
    );
    expect(registry.generatePackageHelp('missing')).toBe('Package missing not found');
  });

  it('holds the sweep commands once the module is loaded', () => {
    for (const name of ['run', 'plan', 'decode', 'inventory']) {
      expect(commandRegistry.getCommand('sweep', name)).toBeDefined();
    }
  });
});
