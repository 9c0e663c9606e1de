// SMTP configuration for the campaign relay
import type { SMTPCredentials } from '../models';
import { config } from './environment';
import { ConfigurationError } from './error-handling';
import { isValidEmailFormat } from './validation';

export interface SMTPConfig {
  host: string;
  port: number;
  secure: boolean; // true for SSL (port 465), false for STARTTLS (port 587)
  useStartTLS: boolean;
  auth: {
    user: string;
    pass: string;
  };
  from: {
    address: string;
    name: string;
  };
}

/**
 * Supplies the sender identity and secret. Credentials are never stored by the dispatcher.
 */
export interface CredentialsProvider {
  getCredentials(): Promise<SMTPCredentials>;
}

/**
 * Reads credentials from SMTP_USERNAME / SMTP_PASSWORD environment variables
 */
export const envCredentialsProvider: CredentialsProvider = {
  async getCredentials() {
    const username = process.env.SMTP_USERNAME;
    const password = process.env.SMTP_PASSWORD;

    if (!username || !password) {
      throw new ConfigurationError('SMTP credentials not configured. Set SMTP_USERNAME and SMTP_PASSWORD environment variables.');
    }

    return {
      username,
      password,
      fromAddress: process.env.FROM_EMAIL_ADDRESS || username,
      fromName: process.env.FROM_EMAIL_NAME || ''
    };
  }
};

/**
 * Builds the relay configuration from environment settings and credentials
 */
export function getSMTPConfig(
  credentials: SMTPCredentials,
  overrides: Partial<Pick<SMTPConfig, 'host' | 'port' | 'useStartTLS'>> = {}
): SMTPConfig {
  const port = overrides.port ?? config.smtpPort;
  const useStartTLS = overrides.useStartTLS ?? config.useStartTLS;

  return {
    host: overrides.host ?? config.smtpHost,
    port,
    secure: !useStartTLS && port === 465,
    useStartTLS,
    auth: {
      user: credentials.username,
      pass: credentials.password
    },
    from: {
      address: credentials.fromAddress,
      name: credentials.fromName
    }
  };
}

/**
 * Validates SMTP configuration
 */
export function validateSMTPConfig(smtpConfig: SMTPConfig): boolean {
  if (!smtpConfig.host || !smtpConfig.port) {
    return false;
  }

  if (!smtpConfig.auth.user || !smtpConfig.auth.pass) {
    return false;
  }

  if (!smtpConfig.from.address || !isValidEmailFormat(smtpConfig.from.address)) {
    return false;
  }

  return true;
}

/**
 * Formats the From header, e.g. `"Campaigns" <news@example.com>`
 */
export function formatSender(smtpConfig: SMTPConfig): string {
  const { address, name } = smtpConfig.from;
  if (!name) {
    return address;
  }
  return `"${name.replace(/"/g, '')}" <${address}>`;
}
