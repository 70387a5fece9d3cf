import pino from "pino";

const levelFor = (nodeEnv: string | undefined): string => {
  if (nodeEnv === "test") {
    return "silent";
  }

  return nodeEnv === "production" ? "info" : "debug";
};

export const logger = pino({
  name: "disclosure-pipeline",
  level: process.env.LOG_LEVEL ?? levelFor(process.env.NODE_ENV),
});

export const toErrorDetails = (error: unknown) => {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return { message: String(error) };
};
