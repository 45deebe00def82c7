// 日志类型与结构化条目
// 控制台由 LOG_LEVEL 过滤（默认 info），只打印与请求处理相关的关键事件。

/** 日志级别（debug < info < warn < error） */
export type LogLevel = "error" | "warn" | "info" | "debug";

/** 日志分类：按模块筛选 */
export type LogCategory =
  | "app"     // HTTP 服务、启动、未预期错误
  | "auth"    // PIN 校验与会话
  | "db"      // 数据库写入
  | "export"  // PDF / HTML 导出
  | "config"; // 配置加载

/** 单条日志的结构化数据 */
export interface LogEntry {
  level: LogLevel;
  category: LogCategory;
  message: string;
  /** 可选上下文（err、id、category 等），输出时序列化为 JSON */
  payload?: Record<string, unknown>;
}
