import { registerAs } from '@nestjs/config';
import { parseIntOr } from './env';

export default registerAs('app', () => ({
  nodeEnv: process.env.NODE_ENV || 'development',
  port: parseIntOr(process.env.PORT, 3000),
  throttleTtl: parseIntOr(process.env.THROTTLE_TTL, 60000),
  throttleLimit: parseIntOr(process.env.THROTTLE_LIMIT, 60),
}));
