// Environment configuration for the clinical decision-support API
// Load server and engine settings from environment variables

const strEnv = (value: string | undefined, fallback = '') => (value ?? fallback).trim();

function parsePort(value: string | undefined, defaultPort: number): number {
  if (!value) return defaultPort;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1 || parsed > 65535) {
    console.error(`Invalid PORT "${value}", using default ${defaultPort}`);
    return defaultPort;
  }
  return parsed;
}

function parsePositiveInt(value: string | undefined, defaultValue: number, name: string): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1) {
    console.error(`Invalid ${name} "${value}", using default ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

// Probabilities must sit in the open interval (0, 1)
function parseProbability(value: string | undefined, defaultValue: number, name: string): number {
  if (!value) return defaultValue;
  const parsed = parseFloat(value);
  if (isNaN(parsed) || parsed <= 0 || parsed >= 1) {
    console.error(`Invalid ${name} "${value}", using default ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

export const env = {
  // Server
  PORT: parsePort(process.env.PORT, 3838),
  HOST: process.env.HOST || '127.0.0.1',
  NODE_ENV: process.env.NODE_ENV || 'development',
  CORS_ORIGINS: (process.env.CORS_ORIGINS || 'http://localhost:3000,http://127.0.0.1:3000')
    .split(',')
    .map(s => s.trim())
    .filter(Boolean),

  // Differential engine
  MAX_DIFFERENTIALS: parsePositiveInt(process.env.MAX_DIFFERENTIALS, 10, 'MAX_DIFFERENTIALS'),
  SIGNIFICANCE_THRESHOLD: parseProbability(
    process.env.SIGNIFICANCE_THRESHOLD,
    0.01,
    'SIGNIFICANCE_THRESHOLD',
  ),

  // Logging
  LOG_LEVEL: strEnv(process.env.LOG_LEVEL, 'info'),
  LOG_PRETTY: process.env.LOG_PRETTY !== 'false',
};

// Log configuration on startup
export function logConfiguration() {
  console.log('Clinical decision-support API configuration:');
  console.log(`  Environment: ${env.NODE_ENV}`);
  console.log(`  Server: ${env.HOST}:${env.PORT}`);
  console.log(`  CORS origins: ${env.CORS_ORIGINS.join(', ') || 'none'}`);
  console.log(`  Max differentials: ${env.MAX_DIFFERENTIALS}`);
  console.log(`  Significance threshold: ${env.SIGNIFICANCE_THRESHOLD}`);
  console.log(`  Log level: ${env.LOG_LEVEL}`);
}
