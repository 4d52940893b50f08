import * as winston from "winston";
import * as path from "node:path";
import * as fs from "node:fs";
import Transport from "winston-transport";
import axios from "axios";
import Config from "@/config/index";

// --- Custom `notify` level for run summaries ---
const customLogLevels = {
  levels: {
    error: 0,
    warn: 1,
    notify: 2,
    info: 3,
    http: 4,
    verbose: 5,
    debug: 6,
    silly: 7,
  },
  colors: {
    error: "red",
    warn: "yellow",
    notify: "blue",
    info: "green",
    http: "magenta",
    verbose: "cyan",
    debug: "white",
    silly: "grey",
  },
};

interface ServiceLogger extends winston.Logger {
  notify: winston.LeveledLogMethod;
}

interface LogInfo {
  level: string;
  message?: unknown;
  [key: string]: unknown;
}

winston.addColors(customLogLevels.colors);

const logsDir = path.join(process.cwd(), "logs");
const archiveDir = path.join(logsDir, "archive");

// Archive the previous run's logs so each batch run starts with clean files
function archiveOldLogs() {
  if (!fs.existsSync(archiveDir)) {
    fs.mkdirSync(archiveDir, { recursive: true });
  }

  const logFiles = ["error.log", "info.log", "combined.log"];
  const timestamp = new Date().toISOString().replace(/[:.]/g, "-");

  for (const logFile of logFiles) {
    const logPath = path.join(logsDir, logFile);
    if (fs.existsSync(logPath)) {
      try {
        const archivePath = path.join(archiveDir, `${timestamp}_${logFile}`);
        fs.copyFileSync(logPath, archivePath);
        fs.truncateSync(logPath, 0);
      } catch (err) {
        console.error(`Failed to archive ${logFile}:`, err);
      }
    }
  }
}

function convertJsToTsPath(jsPath: string): string {
  if (jsPath.endsWith(".ts")) {return jsPath;}
  let tsPath = jsPath.replace(/\.js$/, ".ts");
  if (tsPath.includes("/dist/")) {
    tsPath = tsPath.replace(/\/dist\//, "/");
  }
  return tsPath;
}

function getCallerInfo() {
  const originalStackTraceLimit = Error.stackTraceLimit;
  Error.stackTraceLimit = 20;
  const holder: { stack?: string } = {};
  Error.captureStackTrace(holder, getCallerInfo);
  const stackLines = holder.stack?.split("\n").slice(1) || [];
  Error.stackTraceLimit = originalStackTraceLimit;

  for (const line of stackLines) {
    const match = line.match(/\(([^:]+):(\d+):\d+\)/) || line.match(/at\s+([^:]+):(\d+):\d+/);
    if (match) {
      const [, file, lineNumber] = match;
      if (
        file.includes("node_modules/") ||
        file.includes("internal/") ||
        file.includes("node:") ||
        file.includes("/utils/logger") ||
        file.includes("_stream_transform.js")
      ) {
        continue;
      }
      const functionMatch = line.match(/at\s+([^(]+)\s+\(/);
      return {
        file: convertJsToTsPath(file),
        line: Number.parseInt(lineNumber, 10),
        function: functionMatch?.[1]?.trim() || "anonymous",
      };
    }
  }
  return { file: "unknown", line: 0, function: "anonymous" };
}

const fileAndLine = winston.format((info) => {
  const stackInfo = getCallerInfo();
  if (stackInfo.file !== "unknown") {
    const projectPath = stackInfo.file.replace(process.cwd(), "");
    const relativePath = projectPath.startsWith("/") ? projectPath.substring(1) : projectPath;
    info.logpath = `${relativePath}:${stackInfo.line}`;
    info.function = stackInfo.function;
  } else {
    info.logpath = "unknown:0";
    info.function = "anonymous";
  }
  return info;
});

// ---------------------------------------------------------
// Discord webhook transport for errors and run notifications
// ---------------------------------------------------------
interface DiscordTransportOptions extends Transport.TransportStreamOptions {
  webhookUrl: string;
}

class DiscordTransport extends Transport {
  private webhookUrl: string;

  constructor(opts: DiscordTransportOptions) {
    super(opts);
    this.webhookUrl = opts.webhookUrl;
  }

  log(info: LogInfo, callback: () => void) {
    setImmediate(() => {
      this.emit("logged", info);
    });

    if (this.webhookUrl && (info.level === "error" || info.level === "notify")) {
      void this.sendToDiscord(info);
    }

    callback();
  }

  private async sendToDiscord(info: LogInfo) {
    const isError = info.level === "error";
    const payload = {
      username: "Disaggregation Logger",
      embeds: [
        {
          title: `${isError ? "ERROR" : "NOTIFICATION"}: ${String(info.function ?? "General")}`,
          description: `**Message:**\n${String(info.message)}`,
          color: isError ? 15158332 : 3447003,
          fields: [
            { name: "Source", value: String(info.logpath ?? "unknown"), inline: true },
            { name: "Time", value: String(info.timestamp ?? new Date().toISOString()), inline: true },
          ],
          footer: { text: isError ? "Data integrity alert" : "Run summary" },
        },
      ],
    };

    try {
      await axios.post(this.webhookUrl, payload);
    } catch (error) {
      // Logging through winston here would loop back into this transport
      console.error("Failed to send log to Discord:", error instanceof Error ? error.message : error);
    }
  }
}

const transportsList: winston.transport[] = [];

if (Config.LOG_TO_FILE) {
  archiveOldLogs();
  transportsList.push(
    new winston.transports.File({ filename: path.join(logsDir, "error.log"), level: "error" }),
    new winston.transports.File({ filename: path.join(logsDir, "info.log"), level: "info" }),
    new winston.transports.File({ filename: path.join(logsDir, "combined.log") }),
  );
}

if (Config.DISCORD_WEBHOOK_URL && Config.ENABLE_DISCORD_LOGGING) {
  transportsList.push(new DiscordTransport({ webhookUrl: Config.DISCORD_WEBHOOK_URL }));
}

transportsList.push(
  new winston.transports.Console({
    silent: Config.NODE_ENV === "test",
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.printf((info) => `${String(info.timestamp)} [${String(info.logpath)}] ${info.level}: ${String(info.message)}`),
    ),
  }),
);

export const logger = winston.createLogger({
  level: Config.LOG_LEVEL,
  levels: customLogLevels.levels,
  format: winston.format.combine(
    fileAndLine(),
    winston.format.timestamp(),
    winston.format.json()
  ),
  transports: transportsList,
}) as ServiceLogger;
