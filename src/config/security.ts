import configManager from './app';

const securityEnv = configManager.getSecurityConfig();

function parseAllowedOrigins(value: string): string[] | '*' {
  const origins = value
    .split(',')
    .map(origin => origin.trim())
    .filter(origin => origin.length > 0);
  return origins.length === 0 || origins.includes('*') ? '*' : origins;
}

export const securityConfig = {
  // Allowed origins for CORS
  allowedOrigins: parseAllowedOrigins(securityEnv.allowedOrigins),

  // Content limits
  maxRequestSize: securityEnv.maxRequestSize,

  trustProxy: configManager.getAppConfig().trustProxy,
};

export { parseAllowedOrigins };
