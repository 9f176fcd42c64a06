#!/usr/bin/env node

import * as fs from 'fs';
import * as path from 'path';
import { BddManager } from './manager';
import { formulaVariables } from './parse';
import { classify, satCount, support } from './analysis';
import { toDot, toListing } from './export';
import { defaultCases, runBatch } from './batch';

function printUsage() {
  console.log(`Usage: robdd [COMMAND] [OPTIONS] <formula>

COMMANDS:
  parse                Build the diagram and print a summary
  text                 Print the node listing of the diagram
  dot                  Print the diagram in Graphviz DOT format
  batch [DIR]          Run the standard formula suite, writing
                       <name>.txt and <name>.dot into DIR when given
  help                 Show this help message

OPTIONS:
  -o, --order a,b,c   Variable ordering (default: order of first appearance)
  -h, --help          Show help message

EXAMPLES:
  robdd parse "(a & ~c) | (b ^ d)"
  robdd dot --order c,b,a "a -> (b | c)"
  robdd batch outputs

FORMULA SYNTAX (lowest to highest precedence):
  Bi-implication:     a <-> b
  Implication:        a -> b
  Exclusive or:       a ^ b
  Disjunction:        a | b
  Conjunction:        a & b
  Negation:           ~a
`);
}

interface Invocation {
  command: string;
  ordering: string[] | undefined;
  positional: string[];
}

function parseArgs(args: string[]): Invocation {
  let ordering: string[] | undefined;
  const positional: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';
    if (arg === '-o' || arg === '--order') {
      const value = args[++i];
      if (value === undefined) throw new Error(`Missing value for ${arg}`);
      ordering = value.split(',').map((s) => s.trim());
    } else {
      positional.push(arg);
    }
  }

  const [command = 'help', ...rest] = positional;
  return { command, ordering, positional: rest };
}

function runBatchCommand(dir: string | undefined): number {
  if (dir !== undefined) fs.mkdirSync(dir, { recursive: true });

  let failures = 0;
  for (const result of runBatch(defaultCases)) {
    if (!result.ok) {
      failures++;
      console.error(`${result.name}: ${result.error.message}`);
      continue;
    }
    console.log(
      `${result.name}: root ${result.root}, ${result.nodeCount} nodes, ${result.classification}`
    );
    if (dir !== undefined) {
      fs.writeFileSync(path.join(dir, `${result.name}.txt`), result.listing);
      fs.writeFileSync(path.join(dir, `${result.name}.dot`), result.dot);
    }
  }
  return failures === 0 ? 0 : 1;
}

function main() {
  const args = process.argv.slice(2);

  if (args.length === 0 || args.includes('-h') || args.includes('--help')) {
    printUsage();
    process.exit(0);
  }

  try {
    const { command, ordering, positional } = parseArgs(args);

    if (command === 'help') {
      printUsage();
      process.exit(0);
    }

    if (command === 'batch') {
      process.exit(runBatchCommand(positional[0]));
    }

    if (command !== 'parse' && command !== 'text' && command !== 'dot') {
      console.warn(`Unrecognised command '${command}'.`);
      printUsage();
      process.exit(1);
    }

    const formula = positional[0];
    if (formula === undefined) {
      console.error('Error: Missing formula argument');
      console.error('Use "robdd help" for usage information');
      process.exit(1);
    }

    const manager = new BddManager(ordering ?? formulaVariables(formula));
    const root = manager.parse(formula);

    switch (command) {
      case 'text':
        process.stdout.write(toListing(manager, root));
        break;
      case 'dot':
        process.stdout.write(toDot(manager, root));
        break;
      case 'parse':
        console.log(`Ordering:       ${manager.variableOrdering().join(', ')}`);
        console.log(`Root:           ${root}`);
        console.log(`Total nodes:    ${manager.nodeCount()}`);
        console.log(`Support:        ${support(manager, root).join(', ')}`);
        console.log(`Satisfying:     ${satCount(manager, root)}`);
        console.log(`Classification: ${classify(manager, root)}`);
        break;
    }
  } catch (error) {
    console.error(
      'Error:',
      error instanceof Error ? error.message : String(error)
    );
    process.exit(1);
  }
}

if (require.main === module) {
  main();
}
