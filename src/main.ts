#!/usr/bin/env node
import { Config } from "./infrastructure/config/Config";
import { WinstonLogger } from "./infrastructure/logging/WinstonLogger";
import { LoggingLevelSwitch } from "./domain/entities/LoggingLevelSwitch";
import { ShippingCoordinator } from "./application/services/ShippingCoordinator";
import { createLogShipper } from "./createLogShipper";

class Application {
  private shipper?: ShippingCoordinator;
  private readonly config = Config.getInstance();
  private readonly logger = new WinstonLogger(this.config.get().logging);

  public start(): void {
    try {
      this.logger.info("Starting log shipper");

      this.config.validate();
      const { seq, buffer, shipping } = this.config.get();
      this.logger.info("Configuration loaded", {
        serverUrl: seq.serverUrl,
        bufferBaseFilename: buffer.baseFilename,
        shipping,
        apiKeyConfigured: Boolean(seq.apiKey),
      });

      this.shipper = createLogShipper(
        {
          serverUrl: seq.serverUrl,
          apiKey: seq.apiKey,
          bufferBaseFilename: buffer.baseFilename,
          batchPostingLimit: shipping.batchPostingLimit,
          periodMs: shipping.periodMs,
          eventBodyLimitBytes: shipping.eventBodyLimitBytes,
          levelSwitch: shipping.minimumLevel
            ? new LoggingLevelSwitch(shipping.minimumLevel)
            : null,
        },
        this.logger
      );
      this.shipper.start();

      this.setupGracefulShutdown();
    } catch (error) {
      this.logger.error("Failed to start log shipper", {
        error: error instanceof Error ? error.message : String(error),
      });
      process.exitCode = 1;
    }
  }

  private setupGracefulShutdown(): void {
    const shutdown = async (signal: string) => {
      this.logger.info(`Received ${signal}, flushing and shutting down`);

      try {
        if (this.shipper) {
          await this.shipper.close();
        }
        this.logger.info("Log shipper shutdown completed");
        await this.logger.close();
        process.exit(0);
      } catch (error) {
        this.logger.error("Error during shutdown", {
          error: error instanceof Error ? error.message : String(error),
        });
        process.exit(1);
      }
    };

    process.once("SIGTERM", () => void shutdown("SIGTERM"));
    process.once("SIGINT", () => void shutdown("SIGINT"));
    // Last chance to flush when the event loop drains on its own
    process.once("beforeExit", () => void shutdown("beforeExit"));

    process.on("unhandledRejection", (reason) => {
      this.logger.error("Unhandled rejection", {
        reason: reason instanceof Error ? reason.message : String(reason),
      });
    });
  }
}

new Application().start();
