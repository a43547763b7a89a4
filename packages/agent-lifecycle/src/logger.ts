import pino, { type DestinationStream, type Logger } from "pino";

export type { Logger };

export interface CreateLoggerOptions {
  level?: string;
  destination?: DestinationStream;
}

const resolveLevel = (level: string | undefined): string => {
  const normalized = level?.trim().toLowerCase();
  if (!normalized) {
    return "warn";
  }
  if (["false", "off", "none"].includes(normalized)) {
    return "silent";
  }
  return normalized;
};

/** JSON logs go to stderr so stdout stays free for command output. */
export const createLogger = ({
  level,
  destination,
}: CreateLoggerOptions = {}): Logger =>
  pino(
    { name: "dagent", level: resolveLevel(level) },
    destination ?? pino.destination(2)
  );

export const createSilentLogger = (): Logger => pino({ level: "silent" });
