import "dotenv/config";
import fs from "fs";
import path from "path";

const USE_LOCAL_LOGS = process.env.LOCAL_LOGS === "true";

const EXPORT_FOLDER = "export";

function ensureExportFolder(): void {
  if (!fs.existsSync(EXPORT_FOLDER)) {
    fs.mkdirSync(EXPORT_FOLDER, { recursive: true });
  }
}

/**
 * Logger that mimics console interface
 */
export const logger = {
  log: (...args: unknown[]) => console.log(...args),
  info: (...args: unknown[]) => console.info(...args),
  warn: (...args: unknown[]) => console.warn(...args),
  error: (...args: unknown[]) => console.error(...args),
  debug: (...args: unknown[]) => console.debug(...args),
  /**
   * Log content to file (when LOCAL_LOGS=true) or inline to console
   * Filename format: {prefix}-{timestamp}-{suffix}.{extension}
   */
  logContent: (
    message: string,
    context: Record<string, unknown>,
    file?: {
      content: string;
      prefix: string;
      suffix: string;
      extension?: string;
    }
  ) => {
    if (!file) {
      console.log(message, context);
      return;
    }

    if (USE_LOCAL_LOGS) {
      const date = new Date().toISOString().replace(/:/g, "-");
      const filename = `${file.prefix}-${date}-${file.suffix}.${file.extension ?? "txt"}`;
      ensureExportFolder();
      fs.writeFileSync(path.join(EXPORT_FOLDER, filename), file.content);
      console.log(message, { ...context, fileWritten: filename });
      return;
    }

    console.log(`${message}\n-----------\n${file.content}\n-----------\n`, context);
  },
};
