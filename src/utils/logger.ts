import fs from "fs";
import path from "path";
import chalk from "chalk";

type LogLevel = "INFO" | "WARN" | "ERROR" | "DEBUG";

/** File sink shared between a logger and its children. */
interface LogSink {
  stream: fs.WriteStream | null;
}

const LEVEL_COLORS: Record<LogLevel, (s: string) => string> = {
  INFO: chalk.blue,
  WARN: chalk.yellow,
  ERROR: chalk.red,
  DEBUG: chalk.magenta,
};

export class Logger {
  private name: string;
  private sink: LogSink;

  /**
   * Console-only when `logDir` is null; otherwise also appends plain lines
   * to `<logDir>/<name>.log`.
   */
  constructor(logDir: string | null, name: string) {
    this.name = name;
    this.sink = { stream: null };

    if (logDir) {
      fs.mkdirSync(logDir, { recursive: true });
      this.sink.stream = fs.createWriteStream(path.join(logDir, `${name}.log`), { flags: "a" });
    }
  }

  /**
   * Logger tagged `<parent>:<name>` writing to the same file. Closing either
   * closes the shared file.
   */
  child(name: string): Logger {
    const child = new Logger(null, `${this.name}:${name}`);
    child.sink = this.sink;
    return child;
  }

  info(message: string): void {
    this.emit("INFO", message, console.log);
  }

  warn(message: string): void {
    this.emit("WARN", chalk.yellow(message), console.warn, message);
  }

  error(message: string): void {
    this.emit("ERROR", chalk.red(message), console.error, message);
  }

  debug(message: string): void {
    if (!process.env.VERBOSE) {
      return;
    }
    this.emit("DEBUG", chalk.gray(message), console.log, message);
  }

  close(): Promise<void> {
    const stream = this.sink.stream;
    if (!stream) {
      return Promise.resolve();
    }
    this.sink.stream = null;
    return new Promise((resolve) => stream.end(() => resolve()));
  }

  private emit(level: LogLevel, colored: string, print: (line: string) => void, plain: string = colored): void {
    const timestamp = this.getTimestamp();
    // INFO and WARN are padded so messages line up with ERROR/DEBUG
    const tag = `[${level}]`.padEnd(7);
    print(`${chalk.gray(`[${timestamp}]`)} ${LEVEL_COLORS[level](tag)} ${chalk.cyan(`[${this.name}]`)} ${colored}`);
    this.sink.stream?.write(`[${timestamp}] ${tag} [${this.name}] ${plain}\n`);
  }

  private getTimestamp(): string {
    const now = new Date();
    const hh = String(now.getHours()).padStart(2, "0");
    const mm = String(now.getMinutes()).padStart(2, "0");
    const ss = String(now.getSeconds()).padStart(2, "0");
    return `${hh}:${mm}:${ss}`;
  }
}
