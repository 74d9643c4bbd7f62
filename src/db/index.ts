/**
 * Database module exports
 */

export {
  initDatabase,
  getDatabase,
  closeDatabase,
  openDatabase,
  runMigrations,
  configureConnection,
  MIGRATIONS,
} from './connection.js';

export { unixSeconds, fromUnixSeconds } from './timestamps.js';
export { OTP_EXPIRY_SECONDS, OTP_RETENTION_SECONDS } from './migrations/002_otp_codes.js';
