#!/usr/bin/env node

import { Command } from 'commander';
import { ZodError } from 'zod';
import { GuardSession, LookupError } from './cli/session.js';
import { formatDecision, formatGroups, formatItem, formatVerdict } from './cli/formatter.js';
import { loadConfig } from './config/index.js';
import type { AppConfig } from './config/schema.js';
import { PermissionConfigError } from './core/errors.js';
import { loadDataset } from './dataset/loader.js';
import { createLogger, getLogger } from './logger/index.js';

type LogLevel = AppConfig['logging']['level'];

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

/** 全局选项。 */
interface GlobalOptions {
  config: string;
  data: string;
  logLevel?: string;
}

/**
 * 初始化运行环境（配置 + 日志 + 数据集 + 过滤器）。
 *
 * @param opts - 全局命令行选项。
 * @returns 本次调用的会话。
 */
function initSession(opts: GlobalOptions): GuardSession {
  const config = loadConfig({ configPath: opts.config });
  if (opts.logLevel !== undefined) {
    const level = LOG_LEVELS.find((l) => l === opts.logLevel);
    if (!level) {
      throw new LookupError(`Invalid log level: ${opts.logLevel}. Must be one of: ${LOG_LEVELS.join(', ')}`);
    }
    config.logging.level = level;
  }
  createLogger(config.logging);
  getLogger().debug({ config: opts.config, data: opts.data }, 'Loading policy and dataset');

  return new GuardSession(config.policy, loadDataset(opts.data), getLogger());
}

/**
 * 执行子命令，把已知错误转成一行提示并以状态码 1 退出。
 */
function run(action: (session: GuardSession) => void): void {
  try {
    action(initSession(program.opts<GlobalOptions>()));
  } catch (err) {
    if (err instanceof PermissionConfigError || err instanceof LookupError) {
      console.error(`Error: ${err.message}`);
    } else if (err instanceof ZodError) {
      console.error('Invalid configuration or dataset:');
      for (const issue of err.issues) {
        console.error(`  ${issue.path.join('.') || '<root>'}: ${issue.message}`);
      }
    } else {
      throw err;
    }
    process.exit(1);
  }
}

const program = new Command();

program
  .name('relational-guard')
  .description('Evaluate relational group permissions against a dataset')
  .version('0.1.0')
  .option('-c, --config <path>', 'Policy configuration file', 'guard.yaml')
  .option('-d, --data <path>', 'Dataset file with users and items', 'data.yaml')
  .option('-l, --log-level <level>', 'Override logging.level from the config');

program
  .command('groups')
  .description('List the configured groups and their permissions')
  .action(() => {
    run((session) => {
      console.log(formatGroups(session.filter.groups()));
    });
  });

program
  .command('filter')
  .description('List the items of a content type the user holds a permission on')
  .requiredOption('-t, --type <contentType>', 'Content type name')
  .requiredOption('-p, --permission <name>', 'Permission name')
  .requiredOption('-u, --user <id>', 'User id or name')
  .action((opts: { type: string; permission: string; user: string }) => {
    run((session) => {
      const items = session.filterItems(opts.type, opts.permission, opts.user);
      if (items.length === 0) {
        console.log('No items.');
        return;
      }
      for (const item of items) {
        console.log(formatItem(item));
      }
    });
  });

program
  .command('test')
  .description('Check a permission on a single item')
  .requiredOption('-t, --type <contentType>', 'Content type name')
  .requiredOption('-i, --item <id>', 'Item id')
  .requiredOption('-p, --permission <name>', 'Permission name')
  .requiredOption('-u, --user <id>', 'User id or name')
  .action((opts: { type: string; item: string; permission: string; user: string }) => {
    run((session) => {
      console.log(formatVerdict(session.testItem(opts.type, opts.item, opts.permission, opts.user)));
    });
  });

program
  .command('global')
  .description('Check a global (non-relational) permission')
  .requiredOption('-p, --permission <name>', 'Permission name')
  .requiredOption('-u, --user <id>', 'User id or name')
  .action((opts: { permission: string; user: string }) => {
    run((session) => {
      console.log(formatVerdict(session.testGlobal(opts.permission, opts.user)));
    });
  });

program
  .command('member')
  .description('Check whether the user belongs to a group for an item')
  .requiredOption('-g, --group <name>', 'Group name')
  .requiredOption('-i, --item <id>', 'Item id')
  .requiredOption('-u, --user <id>', 'User id or name')
  .option('-t, --type <contentType>', 'Restrict the item lookup to a content type')
  .action((opts: { group: string; item: string; user: string; type?: string }) => {
    run((session) => {
      console.log(session.isMember(opts.group, opts.item, opts.user, opts.type) ? 'member' : 'not a member');
    });
  });

program
  .command('explain')
  .description('Show the decision expression built for a permission')
  .requiredOption('-t, --type <contentType>', 'Content type name')
  .requiredOption('-p, --permission <name>', 'Permission name')
  .requiredOption('-u, --user <id>', 'User id or name')
  .action((opts: { type: string; permission: string; user: string }) => {
    run((session) => {
      console.log(formatDecision(session.explain(opts.type, opts.permission, opts.user)));
    });
  });

program.parse();
