/**
 * 结构化日志系统
 * 
 * 使用 pino 提供 JSON 格式的结构化日志。
 * 交互式终端下通过 pino-pretty 美化输出，其余环境（容器、测试）直接输出 JSON。
 */

import pino from 'pino';

/** 初始日志级别，允许通过环境变量在任何模块加载前生效 */
const INITIAL_LEVEL = process.env['HUDDLE_LOG_LEVEL'] ?? 'info';

/** 创建全局 logger 实例 */
function createLogger(level: string): pino.Logger {
  if (!process.stdout.isTTY) {
    return pino({ level });
  }

  return pino({
    level,
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:yyyy-mm-dd HH:MM:ss.l',
        ignore: 'pid,hostname',
      },
    },
  });
}

/** 全局 logger */
const logger = createLogger(INITIAL_LEVEL);

/** 已创建的子 logger（模块级常量，级别变更时需要同步） */
const children = new Set<pino.Logger>();

/** 更新日志级别（根 logger 与所有子 logger） */
export function setLogLevel(level: string): void {
  logger.level = level;
  for (const child of children) {
    child.level = level;
  }
}

/** 获取 logger 实例 */
export function getLogger(): pino.Logger {
  return logger;
}

/** 创建子 logger（带模块标签） */
export function createChildLogger(module: string): pino.Logger {
  const child = logger.child({ module });
  children.add(child);
  return child;
}

export { logger };
