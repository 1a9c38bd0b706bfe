import * as dotenv from "dotenv";
import { LogEventLevel, LogEventLevels } from "../../domain/value-objects/LogEventLevel";

// Load environment variables
dotenv.config();

export interface AppConfig {
  seq: {
    serverUrl: string;
    apiKey?: string;
  };
  buffer: {
    baseFilename: string;
  };
  shipping: {
    batchPostingLimit: number;
    periodMs: number;
    eventBodyLimitBytes: number | null;
    minimumLevel: LogEventLevel | null;
  };
  logging: {
    level: string;
    file?: string;
  };
  environment: string;
}

const DEFAULT_BATCH_POSTING_LIMIT = "1000";
const DEFAULT_PERIOD_MS = "2000";
const DEFAULT_EVENT_BODY_LIMIT_BYTES = "262144";

export class Config {
  private static instance: Config;
  private readonly config: AppConfig;
  private readonly rawMinimumLevel?: string;

  private constructor(private readonly env: NodeJS.ProcessEnv) {
    this.rawMinimumLevel = this.getOptionalEnvVar("MINIMUM_LEVEL");
    this.config = this.loadConfig();
  }

  public static getInstance(): Config {
    if (!Config.instance) {
      Config.instance = new Config(process.env);
    }
    return Config.instance;
  }

  /**
   * Build a configuration from an explicit environment, bypassing the
   * process-wide instance.
   */
  public static fromEnvironment(env: NodeJS.ProcessEnv): Config {
    return new Config(env);
  }

  public get(): AppConfig {
    return this.config;
  }

  private loadConfig(): AppConfig {
    const eventBodyLimitBytes = parseInt(
      this.getEnvVar("EVENT_BODY_LIMIT_BYTES", DEFAULT_EVENT_BODY_LIMIT_BYTES)
    );

    return {
      seq: {
        serverUrl: this.getEnvVar("SEQ_SERVER_URL", ""),
        apiKey: this.getOptionalEnvVar("SEQ_API_KEY"),
      },
      buffer: {
        baseFilename: this.getEnvVar("BUFFER_BASE_FILENAME", ""),
      },
      shipping: {
        batchPostingLimit: parseInt(
          this.getEnvVar("BATCH_POSTING_LIMIT", DEFAULT_BATCH_POSTING_LIMIT)
        ),
        periodMs: parseInt(this.getEnvVar("SHIPPING_PERIOD_MS", DEFAULT_PERIOD_MS)),
        // 0 turns the per-event ceiling off
        eventBodyLimitBytes: eventBodyLimitBytes === 0 ? null : eventBodyLimitBytes,
        minimumLevel: LogEventLevels.parse(this.rawMinimumLevel),
      },
      logging: {
        level: this.getEnvVar("LOG_LEVEL", "info"),
        file: this.getOptionalEnvVar("LOG_FILE"),
      },
      environment: this.getEnvVar("NODE_ENV", "development"),
    };
  }

  private getEnvVar(key: string, defaultValue: string): string {
    const value = this.env[key];
    if (value === undefined || value === "") {
      return defaultValue;
    }
    return value;
  }

  private getOptionalEnvVar(key: string): string | undefined {
    const value = this.env[key];
    if (value === undefined || value.trim() === "") {
      return undefined;
    }
    return value;
  }

  private static isHttpUrl(value: string): boolean {
    if (!URL.canParse(value)) {
      return false;
    }
    const { protocol } = new URL(value);
    return protocol === "http:" || protocol === "https:";
  }

  public validate(): void {
    const errors: string[] = [];
    const { seq, buffer, shipping } = this.config;

    if (!seq.serverUrl) {
      errors.push("SEQ_SERVER_URL is required");
    } else if (!Config.isHttpUrl(seq.serverUrl)) {
      errors.push("SEQ_SERVER_URL must be an absolute http(s) URL");
    }

    if (!buffer.baseFilename) {
      errors.push("BUFFER_BASE_FILENAME is required");
    }

    if (!Number.isInteger(shipping.batchPostingLimit) || shipping.batchPostingLimit <= 0) {
      errors.push("BATCH_POSTING_LIMIT must be a positive integer");
    }

    if (!Number.isInteger(shipping.periodMs) || shipping.periodMs <= 0) {
      errors.push("SHIPPING_PERIOD_MS must be positive");
    }

    if (
      shipping.eventBodyLimitBytes !== null &&
      (!Number.isInteger(shipping.eventBodyLimitBytes) || shipping.eventBodyLimitBytes < 0)
    ) {
      errors.push("EVENT_BODY_LIMIT_BYTES must be zero or a positive integer");
    }

    if (this.rawMinimumLevel !== undefined && shipping.minimumLevel === null) {
      errors.push(`MINIMUM_LEVEL '${this.rawMinimumLevel}' is not a known level`);
    }

    if (errors.length > 0) {
      throw new Error(`Configuration validation failed: ${errors.join(", ")}`);
    }
  }
}
