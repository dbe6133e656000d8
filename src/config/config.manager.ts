/**
 * Configuration Manager - holds the validated, immutable service configuration
 */
import { Env, parseEnv } from "./config";

export interface ServerConfig {
  nodeEnv: Env["NODE_ENV"];
  port: number;
  debug: boolean;
  corsOrigin: string;
}

export interface ShotGridConfig {
  url: string;
  scriptName: string;
  scriptKey: string;
  timeoutMs: number;
}

export interface FileMakerConfig {
  baseUrl: string;
  database: string;
  layout: string;
  user?: string;
  password?: string;
  timeoutMs: number;
}

export interface AppConfig {
  server: ServerConfig;
  shotgrid: ShotGridConfig;
  filemaker: FileMakerConfig;
}

const stripTrailingSlash = (url: string): string => url.replace(/\/+$/, "");

export const buildAppConfig = (env: Env): Readonly<AppConfig> =>
  Object.freeze({
    server: Object.freeze({
      nodeEnv: env.NODE_ENV,
      port: env.PORT,
      debug: env.DEBUG,
      corsOrigin: env.CORS_ORIGIN,
    }),
    shotgrid: Object.freeze({
      url: stripTrailingSlash(env.SG_URL),
      scriptName: env.SG_SCRIPT_NAME,
      scriptKey: env.SG_SCRIPT_KEY,
      timeoutMs: env.SHOTGRID_TIMEOUT_MS,
    }),
    filemaker: Object.freeze({
      baseUrl: stripTrailingSlash(env.FMP_BASE_URL),
      database: env.FMP_DATABASE,
      layout: env.FMP_LAYOUT,
      user: env.FMP_USER || undefined,
      password: env.FMP_PASSWORD || undefined,
      timeoutMs: env.FILEMAKER_TIMEOUT_MS,
    }),
  });

export class ConfigManager {
  private static instance?: ConfigManager;

  public readonly server: Readonly<ServerConfig>;
  public readonly shotgrid: Readonly<ShotGridConfig>;
  public readonly filemaker: Readonly<FileMakerConfig>;

  /**
   * Private constructor (Singleton)
   */
  private constructor(config: Readonly<AppConfig>) {
    this.server = config.server;
    this.shotgrid = config.shotgrid;
    this.filemaker = config.filemaker;
  }

  /**
   * Environment is read exactly once, on first access
   */
  public static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager(buildAppConfig(parseEnv()));
    }
    return ConfigManager.instance;
  }

  /**
   * Problems that do not stop the process from starting but will fail
   * every sync request
   */
  public warnings(): string[] {
    const warnings: string[] = [];

    if (!this.filemaker.user || !this.filemaker.password) {
      warnings.push("FMP_USER and FMP_PASSWORD are not both set");
    }

    return warnings;
  }
}
