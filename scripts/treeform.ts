#!/usr/bin/env node
import { cac } from 'cac';
import { baselineCommand } from '../src/cli/commands/baseline.js';
import { dumpCommand } from '../src/cli/commands/dump.js';
import { lowerCommand } from '../src/cli/commands/lower.js';
import { handleError } from '../src/cli/utils/error-handler.js';

function wrapAction<Args extends unknown[]>(fn: (...args: Args) => Promise<void> | void) {
  return async (...args: Args): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      handleError(error);
    }
  };
}

async function main(): Promise<void> {
  const cli = cac('treeform');

  cli
    .command('dump <file>', '以调试文本格式输出 JSON 语法树')
    .action(
      wrapAction(async (file: string) => {
        await dumpCommand(file);
      })
    );

  cli
    .command('lower <file>', '执行遍历管道并输出结果树')
    .option('--design-time', '启用设计时降级', { default: false })
    .option('--json', '以 JSON 格式输出', { default: false })
    .action(
      wrapAction(async (file: string, options: { designTime?: boolean; json?: boolean }) => {
        await lowerCommand(file, {
          designTime: Boolean(options.designTime),
          json: Boolean(options.json),
        });
      })
    );

  cli
    .command('baseline <file>', '与基线文件比对（或重新生成）')
    .option('--name <name>', '基线名（相对基线根目录）')
    .option('--root <dir>', '基线根目录（默认 TREEFORM_BASELINE_ROOT 或 test/baselines）')
    .option('--generate', '写出基线而不是比对')
    .option('--no-verify', '跳过区间不变式校验')
    .action(
      wrapAction(async (file: string, options: Record<string, unknown>) => {
        if (typeof options.name !== 'string' || options.name.length === 0) {
          throw new Error('baseline 需要 --name <name>');
        }
        await baselineCommand(file, {
          name: options.name,
          ...(typeof options.generate === 'boolean' ? { generate: options.generate } : {}),
          ...(typeof options.root === 'string' ? { root: options.root } : {}),
          verify: options.verify !== false,
        });
      })
    );

  cli
    .command('help', '显示使用说明')
    .action(() => {
      cli.outputHelp();
    });

  cli.help();
  cli.parse();
}

main().catch(handleError);
