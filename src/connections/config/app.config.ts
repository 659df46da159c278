import dotenv from 'dotenv';

dotenv.config();

/**
 * Parse CORS origins from environment variable
 * Supports comma or space separated values
 */
const parseCorsOrigins = (): string[] => {
  const corsOrigins = process.env.CORS_ORIGINS || '';
  if (!corsOrigins) {
    return [];
  }

  return corsOrigins
    .split(/[,\s]+/)
    .map(origin => origin.trim())
    .filter(origin => origin.length > 0);
};

export const appConfig = {
  port: parseInt(process.env.APP_PORT || process.env.PORT || '3000'),
  nodeEnv: process.env.NODE_ENV || 'development',
  logLevel: (process.env.LOG_LEVEL || 'info').toLowerCase(),
  jwtSecret: process.env.JWT_SECRET || 'secret',
  corsOrigins: parseCorsOrigins(),
  // Status updates with a worse GPS fix than this are rejected
  gpsMaxAccuracyMeters: parseInt(process.env.GPS_MAX_ACCURACY_METERS || '30'),
  lowStockThreshold: parseInt(process.env.LOW_STOCK_THRESHOLD || '10'),
  shipmentListLimit: parseInt(process.env.SHIPMENT_LIST_LIMIT || '500'),
};
