import fs from 'node:fs';
import path from 'node:path';

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export interface MediaLibSQLConfig {
  url: string;
  authToken?: string;
}

export interface MediaConfig {
  libsql: MediaLibSQLConfig;
  migrationsPath: string;
}

export interface AppConfig {
  media: MediaConfig;
}

interface RawConfigFile {
  media?: Partial<Omit<MediaConfig, 'libsql'>> & {
    libsql?: Partial<MediaLibSQLConfig>;
  };
}

const DEFAULTS: AppConfig = {
  media: {
    libsql: {
      url: 'file:./data/media.db',
      authToken: undefined,
    },
    migrationsPath: './sql',
  },
};

export function loadConfig(configPath = path.resolve(process.cwd(), 'config/app.config.json')): AppConfig {
  let fileOverrides: RawConfigFile = {};

  if (fs.existsSync(configPath)) {
    try {
      const contents = fs.readFileSync(configPath, 'utf-8');
      fileOverrides = JSON.parse(contents) as RawConfigFile;
    } catch (error) {
      throw new ConfigurationError(`Unable to parse config file: ${configPath}`);
    }
  }

  const media = fileOverrides.media ?? {};

  const libsqlUrl = String(
    process.env.MEDIA_LIBSQL_URL ??
    process.env.TURSO_DATABASE_URL ??
    media.libsql?.url ??
    DEFAULTS.media.libsql.url,
  ).trim();
  const libsqlAuthToken =
    process.env.MEDIA_LIBSQL_AUTH_TOKEN ??
    process.env.TURSO_AUTH_TOKEN ??
    media.libsql?.authToken ??
    DEFAULTS.media.libsql.authToken;

  if (!libsqlUrl) {
    throw new ConfigurationError('MEDIA_LIBSQL_URL must not be blank. Set it in the environment or in config/app.config.json');
  }

  return {
    media: {
      libsql: {
        url: libsqlUrl,
        authToken: libsqlAuthToken || undefined,
      },
      migrationsPath: String(process.env.MEDIA_MIGRATIONS_PATH ?? media.migrationsPath ?? DEFAULTS.media.migrationsPath),
    },
  };
}
