export { createLogShipper, LogShipperOptions } from './createLogShipper';
export {
  ShippingCoordinator,
  ShippingOptions,
  REQUIRED_LEVEL_CHECK_INTERVAL_MS
} from './application/services/ShippingCoordinator';
export { TickTimer } from './application/services/TickTimer';
export { Logger, LogMeta } from './application/interfaces/Logger';
export { LoggingLevelSwitch } from './domain/entities/LoggingLevelSwitch';
export { Bookmark } from './domain/value-objects/Bookmark';
export { LogEventLevel, LogEventLevels } from './domain/value-objects/LogEventLevel';
export { ShippingState } from './domain/value-objects/ShippingState';
export { DeliveryOutcome } from './domain/services/DeliveryService';
export {
  HttpDeliveryClient,
  HttpTransport,
  HttpResponseLike,
  HttpRequestInit
} from './infrastructure/http/HttpDeliveryClient';
export { SeqApi } from './infrastructure/http/SeqApi';
export { WinstonLogger } from './infrastructure/logging/WinstonLogger';
