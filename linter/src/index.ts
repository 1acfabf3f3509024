#!/usr/bin/env node
/**
 * minipy linter CLI entry point.
 *
 * Usage:
 *   minipy-lint <file.py> [...]
 *   minipy-lint --rule unused-vars <file.py>
 *   minipy-lint --disable duplicate-function <file.py>
 */

import * as fs from 'fs';
import * as path from 'path';
import { createDefaultLinter, formatDiagnostic, LintOptions } from './linter';

/**
 * Run the linter CLI over `args` and return its exit code.
 */
export function lintMain(args: string[]): number {
  if (args.length === 0 || args.includes('--help') || args.includes('-h')) {
    printUsage();
    return 0;
  }

  const options: LintOptions = {};
  const files: string[] = [];
  const enabledRules: string[] = [];
  const disabledRules: string[] = [];

  for (let i = 0; i < args.length; i++) {
    switch (args[i]) {
      case '--rule':
      case '--disable': {
        const name = args[i + 1];
        if (name === undefined) {
          console.error(`Error: ${args[i]} requires a rule name`);
          return 1;
        }
        (args[i] === '--rule' ? enabledRules : disabledRules).push(name);
        i++;
        break;
      }
      case '--list-rules': {
        const linter = createDefaultLinter();
        console.log('Available rules:');
        for (const name of linter.getRuleNames()) {
          console.log(`  ${name}`);
        }
        return 0;
      }
      default:
        if (args[i].startsWith('-')) {
          console.error(`Unknown option: ${args[i]}`);
          return 1;
        }
        files.push(args[i]);
        break;
    }
  }

  if (enabledRules.length > 0) options.enabledRules = enabledRules;
  if (disabledRules.length > 0) options.disabledRules = disabledRules;

  if (files.length === 0) {
    console.error('Error: no files specified');
    return 1;
  }

  const linter = createDefaultLinter();
  let totalDiagnostics = 0;
  let totalErrors = 0;

  for (const file of files) {
    const resolved = path.resolve(file);
    if (!fs.existsSync(resolved)) {
      console.error(`Error: File not found: ${resolved}`);
      return 1;
    }

    const diagnostics = linter.lint(fs.readFileSync(resolved, 'utf-8'), options);
    totalDiagnostics += diagnostics.length;
    totalErrors += diagnostics.filter(d => d.severity === 'error').length;

    if (diagnostics.length > 0) {
      console.log(`${file}:`);
      for (const d of diagnostics) {
        console.log(formatDiagnostic(d, file));
      }
      console.log('');
    }
  }

  // Summary
  if (totalDiagnostics === 0) {
    console.log(`All clean! ${files.length} file${files.length === 1 ? '' : 's'} checked.`);
  } else {
    const warnings = totalDiagnostics - totalErrors;
    const parts: string[] = [];
    if (totalErrors > 0) parts.push(`${totalErrors} error${totalErrors === 1 ? '' : 's'}`);
    if (warnings > 0) parts.push(`${warnings} warning${warnings === 1 ? '' : 's'}`);
    console.log(`Found ${parts.join(' and ')} in ${files.length} file${files.length === 1 ? '' : 's'}.`);
  }

  return totalErrors > 0 ? 1 : 0;
}

function printUsage(): void {
  console.log('minipy linter v0.1.0');
  console.log('');
  console.log('Usage:');
  console.log('  minipy lint <file.py> [...]              Lint files');
  console.log('  minipy lint --rule <name> <file.py>      Run only specific rule(s)');
  console.log('  minipy lint --disable <name> <file.py>   Disable specific rule(s)');
  console.log('  minipy lint --list-rules                 List available rules');
  console.log('');
  console.log('Rules:');
  for (const rule of createDefaultLinter().getRules()) {
    console.log(`  ${rule.name.padEnd(24)} ${rule.description}`);
  }
}

if (require.main === module) {
  process.exitCode = lintMain(process.argv.slice(2));
}
