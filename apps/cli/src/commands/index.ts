import type { Command } from 'commander';
import { registerAnalyzeAddressesCommand } from './analyzeAddresses';
import { registerImportCommand } from './import';
import { registerOnboardCommand } from './onboard';

export function registerCommands(program: Command): void {
  registerOnboardCommand(program);
  registerImportCommand(program);
  registerAnalyzeAddressesCommand(program);
}
