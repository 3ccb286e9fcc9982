import { Writable } from "node:stream"
import type { LogEntry, LoggerHarness } from "../../../ports/__tests__/logger-harness"
import type { LogLevelName } from "../../../ports/log-level"
import { PinoLogger } from "../pino-logger"

const pinoLevelToName: Record<number, LogLevelName> = {
  10: "trace",
  20: "debug",
  30: "info",
  40: "warn",
  50: "error",
  60: "fatal",
}

export function pinoHarness(): LoggerHarness {
  return {
    name: "PinoLogger",
    make: (level = "trace") => {
      const captured: LogEntry[] = []

      const destination = new Writable({
        write(chunk, _, cb) {
          const { msg, ...fields }: Record<string, unknown> = JSON.parse(String(chunk))

          captured.push({
            level: pinoLevelToName[Number(fields.level)] ?? "info",
            message: String(msg),
            fields,
          })

          cb()
        },
      })

      return {
        logger: new PinoLogger(
          { destination },
          { level, prettify: false },
          {},
        ),
        entries: () => [...captured],
        reset: () => {
          captured.length = 0
        },
      }
    },
  }
}
