import { configureLogging, type Logger } from "@mailstop/logger"
import type { AppConfig } from "../config"

export type CoreServices = {
  logger: Logger
}

export function createCoreServices(config: AppConfig): CoreServices {
  const logger = configureLogging({
    level: config.logging.level,
    format: config.logging.format,
    driver: config.logging.driver,
  })

  return { logger }
}
