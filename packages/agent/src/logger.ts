type Level = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<Level, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function isLevel(value: string | undefined): value is Level {
  return value === "debug" || value === "info" || value === "warn" || value === "error";
}

function threshold(): number {
  const configured = process.env.LOG_LEVEL;
  return isLevel(configured) ? LEVEL_ORDER[configured] : LEVEL_ORDER.info;
}

function emit(level: Level, msg: string, data?: Record<string, unknown>): void {
  if (LEVEL_ORDER[level] < threshold()) return;
  const entry: Record<string, unknown> = {
    ts: new Date().toISOString(),
    level,
    msg,
  };
  if (data !== undefined) {
    entry.data = data;
  }
  const line = JSON.stringify(entry, (_key, value) =>
    typeof value === "bigint" ? value.toString() : value,
  );
  if (level === "error") {
    process.stderr.write(line + "\n");
  } else {
    process.stdout.write(line + "\n");
  }
}

export const log = {
  debug(msg: string, data?: Record<string, unknown>): void {
    emit("debug", msg, data);
  },
  info(msg: string, data?: Record<string, unknown>): void {
    emit("info", msg, data);
  },
  warn(msg: string, data?: Record<string, unknown>): void {
    emit("warn", msg, data);
  },
  error(msg: string, data?: Record<string, unknown>): void {
    emit("error", msg, data);
  },
};
