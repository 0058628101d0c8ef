#!/usr/bin/env -S npx tsx
import { promises as fs } from "node:fs";
import path from "node:path";
import process from "node:process";
import { pathToFileURL } from "node:url";
import { parseInteger, parseProgram } from "../arm64-ast";
import {
  formatDecoded,
  formatRegisters,
  formatStack,
  hex64,
  type TraceEntry,
} from "../arm64-engine";
import { emulate, type EmulateOptions } from "../lib/emulator";
import type { EmulationResult } from "../lib/emulator-schema";

const DEFAULT_TARGET = "asm_case";
const ASM_EXTENSIONS = [".s", ".asm"];

type CliMode = "run" | "decode";

type CliOptions = {
  mode: CliMode;
  trace: boolean;
  maxSteps?: number;
  stackBase?: bigint;
  stackSize?: number;
};

type ParsedArgs = {
  options: CliOptions;
  targets: string[];
};

type EmulateFn = (source: string, options: EmulateOptions) => EmulationResult;

async function main() {
  let parsed: ParsedArgs;
  try {
    parsed = parseArgs(process.argv.slice(2));
  } catch (err) {
    console.error(err instanceof Error ? err.message : err);
    process.exit(1);
    return;
  }
  const { options, targets } = parsed;
  const targetList = targets.length > 0 ? targets : [DEFAULT_TARGET];
  const files = await collectAsmFiles(targetList);
  if (files.length === 0) {
    console.error("アセンブリファイルが見つかりませんでした。");
    process.exit(1);
  }

  let hadFailure = false;
  for (const filePath of files) {
    const ok = await runSingleCase(filePath, options);
    if (!ok) hadFailure = true;
  }

  if (hadFailure) {
    process.exit(1);
  }
}

function parsePositiveInt(flag: string, value: string | undefined): number {
  const parsed = Number.parseInt(value ?? "", 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`${flag} は正の整数で指定してください`);
  }
  return parsed;
}

function parseArgs(argv: string[]): ParsedArgs {
  const options: CliOptions = { mode: "run", trace: false };
  const targets: string[] = [];

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (!arg.startsWith("--")) {
      targets.push(arg);
      continue;
    }

    const [flag, maybeValue] = arg.includes("=")
      ? ((): [string, string | undefined] => {
          const [k, v] = arg.split("=", 2);
          return [k, v];
        })()
      : [arg, undefined];

    switch (flag) {
      case "--mode": {
        const value = maybeValue ?? argv[++i];
        if (value === "run" || value === "decode") {
          options.mode = value;
          break;
        }
        throw new Error(
          `--mode は 'run' | 'decode' を指定してください (got: ${value ?? ""})`,
        );
      }
      case "--max-steps":
        options.maxSteps = parsePositiveInt(flag, maybeValue ?? argv[++i]);
        break;
      case "--stack-size":
        options.stackSize = parsePositiveInt(flag, maybeValue ?? argv[++i]);
        break;
      case "--stack-base": {
        const value = maybeValue ?? argv[++i];
        const parsed = parseInteger(value ?? "");
        if (parsed === undefined || parsed < 0n) {
          throw new Error(
            `--stack-base は 0 以上の整数 (10 進または 0x 付き 16 進) で指定してください (got: ${value ?? ""})`,
          );
        }
        options.stackBase = parsed;
        break;
      }
      case "--trace":
        options.trace = true;
        break;
      case "--help": {
        printUsage();
        process.exit(0);
        break;
      }
      default:
        throw new Error(`未知のフラグです: ${flag}`);
    }
  }

  return { options, targets };
}

function printUsage() {
  console.log(`ARM64 アセンブリ実行スクリプト
Usage: tsx scripts/run-arm64.ts [options] [file|dir ...]

Options:
  --mode <run|decode>     run: 実行して最終状態を表示 / decode: デコード結果のみ表示 (default: run)
  --max-steps <n>         実行命令数の上限 (default: 100000)
  --stack-base <n|0x..>   スタック領域の先頭アドレス (default: 0)
  --stack-size <n>        スタック領域のバイト数 (default: 256)
  --trace                 実行した命令を 1 行ずつ表示
  --help                  このヘルプを表示

引数を省略すると asm_case/ 以下の全 .s / .asm を実行します。`);
}

const isAsmFile = (name: string) =>
  ASM_EXTENSIONS.some((ext) => name.endsWith(ext));

async function collectAsmFiles(targets: string[]): Promise<string[]> {
  const collected = new Set<string>();
  for (const raw of targets) {
    const resolved = path.resolve(raw);
    try {
      const stats = await fs.stat(resolved);
      if (stats.isDirectory()) {
        await collectFromDir(resolved, collected);
      } else if (stats.isFile() && isAsmFile(resolved)) {
        collected.add(resolved);
      }
    } catch (err) {
      console.error(`パスを解決できませんでした: ${raw}`);
      console.error(err);
    }
  }
  return Array.from(collected).sort();
}

async function collectFromDir(dir: string, acc: Set<string>) {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  await Promise.all(
    entries.map(async (entry) => {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await collectFromDir(fullPath, acc);
      } else if (entry.isFile() && isAsmFile(entry.name)) {
        acc.add(fullPath);
      }
    }),
  );
}

async function runSingleCase(
  filePath: string,
  options: CliOptions,
  emulateFn: EmulateFn = emulate,
): Promise<boolean> {
  const relPath = path.relative(process.cwd(), filePath) || filePath;
  console.log(`\n=== ${relPath} ===`);

  let source: string;
  try {
    source = await fs.readFile(filePath, "utf8");
  } catch (err) {
    console.error("ファイルを読み込めませんでした", err);
    return false;
  }

  if (options.mode === "decode") {
    return printDecoded(source);
  }

  const result = emulateFn(source, {
    maxSteps: options.maxSteps,
    stackBase: options.stackBase,
    stackSize: options.stackSize,
    trace: options.trace,
  });
  printEmulationResult(result);
  // エラーや上限打ち切りは失敗扱いにする
  return result.status === "halted" || result.status === "finished";
}

function printDecoded(source: string): boolean {
  try {
    const program = parseProgram(source);
    for (const instr of program.instructions) {
      console.log(`PC: ${hex64(BigInt(instr.address))}`);
      console.log(formatDecoded(instr.index, instr.decoded));
    }
    return true;
  } catch (err) {
    console.error("デコードに失敗しました", err);
    return false;
  }
}

function formatTraceEntry(entry: TraceEntry): string {
  return `[${entry.step}] ${hex64(entry.pc)} #${entry.index} (line ${entry.sourceLine}) ${entry.text}`;
}

function printEmulationResult(result: EmulationResult) {
  for (const entry of result.trace) {
    console.log(formatTraceEntry(entry));
  }
  console.log(`status       : ${result.status}`);
  console.log(`instructions : ${result.instructionCount}`);
  console.log(`steps        : ${result.steps}`);

  if (result.error) {
    console.log(`error.type   : ${result.error.type}`);
    console.log(`error.msg    : ${result.error.message}`);
  }
  if (result.registers) console.log(formatRegisters(result.registers));
  if (result.stack) console.log(formatStack(result.stack));
}

const entryPath = process.argv[1];

if (entryPath && import.meta.url === pathToFileURL(entryPath).href) {
  main().catch((err) => {
    console.error(err);
    process.exit(1);
  });
}

export { parseArgs, runSingleCase, formatTraceEntry };
