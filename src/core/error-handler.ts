/**
 * 错误处理模块
 * 提供统一的错误处理机制，包括错误类型、错误生成和格式化方法
 */

// 错误类别枚举
export enum ErrorCategory {
  CONFIG = "CONFIG", // 配置错误
  VERSION = "VERSION", // 源码树或锚点与目标版本不符
  ANCHOR = "ANCHOR", // 锚点歧义或规则冲突
  BACKUP = "BACKUP", // 备份错误
  FILE_OPERATION = "FILE_OPERATION", // 文件操作错误
  PLAN = "PLAN", // 补丁计划查找错误
  UNKNOWN = "UNKNOWN", // 未知错误
}

// 错误严重级别
export enum ErrorSeverity {
  WARNING = "WARNING", // 警告，不会中断处理
  ERROR = "ERROR", // 错误，中断当前文件处理
  FATAL = "FATAL", // 致命错误，中断整个处理流程
}

// 统一错误接口
export interface PatchError {
  code: string; // 错误代码，例如 ANCHOR001
  category: ErrorCategory;
  message: string;
  details?: string;
  filePath?: string;
  /** 相关规则的名称 */
  rule?: string;
  severity: ErrorSeverity;
  suggestion?: string;
  originalError?: Error;
}

interface ErrorDefinition {
  code: string;
  category: ErrorCategory;
  messageTemplate: string;
  severity: ErrorSeverity;
  suggestionTemplate?: string;
}

const errorDefinitions: Record<string, ErrorDefinition> = {
  // 配置错误
  CONFIG001: {
    code: "CONFIG001",
    category: ErrorCategory.CONFIG,
    messageTemplate: "Invalid option {0}: {1}",
    severity: ErrorSeverity.FATAL,
    suggestionTemplate: "Check the value passed for {0}.",
  },

  // 版本错误
  VERSION001: {
    code: "VERSION001",
    category: ErrorCategory.VERSION,
    messageTemplate: "Source tree not recognized as {0}: {1}",
    severity: ErrorSeverity.FATAL,
    suggestionTemplate:
      "Point the tool at the root of an unmodified {0} checkout.",
  },
  VERSION002: {
    code: "VERSION002",
    category: ErrorCategory.VERSION,
    messageTemplate: "Anchor for rule \"{0}\" not found",
    severity: ErrorSeverity.ERROR,
    suggestionTemplate:
      "The file does not match the expected upstream layout. Compare it against the upstream source and adapt the patch manually.",
  },
  VERSION003: {
    code: "VERSION003",
    category: ErrorCategory.VERSION,
    messageTemplate: "Detected version {1}, but this patch plan targets {0}",
    severity: ErrorSeverity.WARNING,
    suggestionTemplate:
      "Anchors are still checked exactly; any file that differs from {0} will be refused.",
  },

  // 锚点错误
  ANCHOR001: {
    code: "ANCHOR001",
    category: ErrorCategory.ANCHOR,
    messageTemplate: "Anchor for rule \"{0}\" is ambiguous: found {1} occurrences",
    severity: ErrorSeverity.ERROR,
    suggestionTemplate:
      "The upstream source no longer has the assumed shape. Patch it manually.",
  },
  ANCHOR002: {
    code: "ANCHOR002",
    category: ErrorCategory.ANCHOR,
    messageTemplate: "Rules \"{0}\" and \"{1}\" target overlapping text",
    severity: ErrorSeverity.ERROR,
    suggestionTemplate: "Each rule of a file must edit a distinct region.",
  },
  ANCHOR003: {
    code: "ANCHOR003",
    category: ErrorCategory.ANCHOR,
    messageTemplate: "Anchor for rule \"{0}\" is empty",
    severity: ErrorSeverity.ERROR,
  },

  // 备份错误
  BACKUP001: {
    code: "BACKUP001",
    category: ErrorCategory.BACKUP,
    messageTemplate: "Backup already exists: {0}",
    severity: ErrorSeverity.ERROR,
    suggestionTemplate:
      "To protect the previous backup this file is left alone. Move or rename {0} and re-run.",
  },
  BACKUP002: {
    code: "BACKUP002",
    category: ErrorCategory.BACKUP,
    messageTemplate: "No backup to restore from: {0}",
    severity: ErrorSeverity.ERROR,
  },
  BACKUP003: {
    code: "BACKUP003",
    category: ErrorCategory.BACKUP,
    messageTemplate: "Backup does not match the original file: {0}",
    severity: ErrorSeverity.ERROR,
    suggestionTemplate: "Check free disk space and permissions, then re-run.",
  },

  // 文件操作错误
  FILE001: {
    code: "FILE001",
    category: ErrorCategory.FILE_OPERATION,
    messageTemplate: "Failed to read file: {0}",
    severity: ErrorSeverity.ERROR,
    suggestionTemplate: "Make sure the file exists and is readable.",
  },
  FILE002: {
    code: "FILE002",
    category: ErrorCategory.FILE_OPERATION,
    messageTemplate: "Failed to write patched file: {0}",
    severity: ErrorSeverity.ERROR,
    suggestionTemplate:
      "The original content is restored from the backup when possible. Check permissions and free disk space.",
  },
  FILE003: {
    code: "FILE003",
    category: ErrorCategory.FILE_OPERATION,
    messageTemplate: "Missing required file: {0}",
    severity: ErrorSeverity.ERROR,
    suggestionTemplate: "Ensure the path points at an unmodified {1} source tree.",
  },
  FILE004: {
    code: "FILE004",
    category: ErrorCategory.FILE_OPERATION,
    messageTemplate: "File is not valid UTF-8: {0}",
    severity: ErrorSeverity.ERROR,
  },
  FILE005: {
    code: "FILE005",
    category: ErrorCategory.FILE_OPERATION,
    messageTemplate: "Written content failed verification: {0}",
    severity: ErrorSeverity.ERROR,
  },

  // 补丁计划错误
  PLAN001: {
    code: "PLAN001",
    category: ErrorCategory.PLAN,
    messageTemplate: "No patch plan for version {0}",
    severity: ErrorSeverity.FATAL,
    suggestionTemplate: "Supported versions: {1}",
  },
  PLAN002: {
    code: "PLAN002",
    category: ErrorCategory.PLAN,
    messageTemplate: "Patch plan {1} has no target file \"{0}\"",
    severity: ErrorSeverity.FATAL,
  },

  // 通用错误
  GENERAL001: {
    code: "GENERAL001",
    category: ErrorCategory.UNKNOWN,
    messageTemplate: "Unknown error: {0}",
    severity: ErrorSeverity.ERROR,
  },
};

/**
 * 携带 PatchError 的异常，用于无法返回结果对象的调用点
 */
export class PatchFailure extends Error {
  readonly detail: PatchError;

  constructor(detail: PatchError) {
    super(detail.message);
    this.name = "PatchFailure";
    this.detail = detail;
  }
}

/**
 * 创建格式化的错误对象
 */
export function createPatchError(
  errorCode: string,
  params: string[] = [],
  options: {
    filePath?: string;
    rule?: string;
    details?: string;
    originalError?: Error;
  } = {}
): PatchError {
  const definition = errorDefinitions[errorCode] ?? errorDefinitions.GENERAL001;

  // 替换模板中的参数（同一个占位符可能出现多次）
  let message = definition.messageTemplate;
  let suggestion = definition.suggestionTemplate ?? "";

  params.forEach((param, index) => {
    message = message.split(`{${index}}`).join(param);
    suggestion = suggestion.split(`{${index}}`).join(param);
  });

  const details =
    options.details ??
    (options.originalError ? options.originalError.message : undefined);

  return {
    code: definition.code,
    category: definition.category,
    message,
    details,
    filePath: options.filePath,
    rule: options.rule,
    severity: definition.severity,
    suggestion: suggestion || undefined,
    originalError: options.originalError,
  };
}

/**
 * 格式化错误为单条日志
 */
export function formatError(error: PatchError): string {
  const prefix =
    error.severity === ErrorSeverity.WARNING ? "[WARN]" : "[ERROR]";
  let formattedMessage = `${prefix} [${error.code}] ${error.message}`;

  if (error.filePath) {
    formattedMessage += `\n  File: ${error.filePath}`;
  }

  if (error.rule) {
    formattedMessage += `\n  Rule: ${error.rule}`;
  }

  if (error.details && error.details !== error.message) {
    formattedMessage += `\n  Details: ${error.details}`;
  }

  if (error.suggestion) {
    formattedMessage += `\n  Suggestion: ${error.suggestion}`;
  }

  return formattedMessage;
}

/**
 * 记录错误
 */
export function logError(error: PatchError): void {
  const formattedError = formatError(error);

  if (error.severity === ErrorSeverity.WARNING) {
    console.warn(formattedError);
  } else {
    console.error(formattedError);
  }
}

/**
 * 将任意异常转换为 PatchError
 * PatchFailure 直接取出其携带的错误，文件系统错误按错误码归类
 */
export function enhanceError(error: unknown, filePath?: string): PatchError {
  if (error instanceof PatchFailure) {
    return error.detail;
  }

  const normalized = error instanceof Error ? error : new Error(String(error));
  const errno = getErrorCode(normalized);

  if (errno === "ENOENT") {
    return createPatchError("FILE003", [filePath ?? normalized.message, "upstream"], {
      filePath,
      originalError: normalized,
    });
  }

  if (errno === "EACCES" || errno === "EPERM" || errno === "EISDIR") {
    return createPatchError("FILE001", [filePath ?? normalized.message], {
      filePath,
      originalError: normalized,
    });
  }

  return createPatchError("GENERAL001", [normalized.message], {
    filePath,
    originalError: normalized,
  });
}

function getErrorCode(error: Error): string | undefined {
  if ("code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}
