/**
 * Main Application Orchestrator
 * Wires the components together and owns startup, the update loop and shutdown
 */
import { logger, symbols } from './Logger.js';
import { EventBus, EventTypes } from './EventBus.js';
import { APP_VERSION } from './version.js';
import { ConfigManager } from '../config/ConfigManager.js';
import { cachedIpSnapshotSchema, hostnameIpMapSchema } from '../config/schema.js';
import { HttpClient, buildUserAgent, type FetchFn } from '../http/HttpClient.js';
import { StorageContainer } from '../storage/StorageContainer.js';
import { NoIpDiscoveryService, NoIpUpdater, type Updater } from '../providers/index.js';
import { UpdateScheduler } from '../services/index.js';

export interface ApplicationOptions {
  env?: Record<string, string | undefined>;
  fetchFn?: FetchFn;
  installSignalHandlers?: boolean;
}

export class Application {
  readonly config: ConfigManager;
  readonly eventBus: EventBus;
  readonly updaters: Updater[];
  private scheduler: UpdateScheduler;
  private isRunning: boolean = false;
  private shutdownPromise: Promise<void> | null = null;
  private unsubscribers: Array<() => void> = [];

  /**
   * Build every component. Throws ConfigurationError when configuration is missing or invalid.
   */
  constructor(private options: ApplicationOptions = {}) {
    this.config = new ConfigManager(options.env);
    this.eventBus = new EventBus();

    const { app } = this.config;

    if (!app.contactEmail) {
      logger.warn('CONTACT_EMAIL is not set; providers may block clients that do not identify an operator contact');
    }

    const httpClient = new HttpClient({
      timeoutMs: app.httpTimeout,
      headers: { 'User-Agent': buildUserAgent(app.contactEmail) },
      fetchFn: options.fetchFn,
    });

    const discovery = new NoIpDiscoveryService({
      httpClient,
      store: new StorageContainer(app.dataDir, ['noip', 'settings.json'], cachedIpSnapshotSchema),
      maxAgeMs: app.ipCacheMaxAge,
      eventBus: this.eventBus,
    });

    this.updaters = [
      new NoIpUpdater({
        httpClient,
        discovery,
        store: new StorageContainer(app.dataDir, ['noip', 'db.json'], hostnameIpMapSchema),
        entries: this.config.loadProviderConfig('noip.com'),
        eventBus: this.eventBus,
      }),
    ];

    this.scheduler = new UpdateScheduler(this.updaters, {
      interval: app.updateInterval,
      eventBus: this.eventBus,
    });
  }

  /**
   * Start the application
   */
  async start(): Promise<void> {
    if (this.isRunning) {
      logger.warn('Application already running');
      return;
    }

    logger.info({ version: APP_VERSION }, `${symbols.startup} Starting ddns-sync`);

    this.subscribeToEvents();

    if (this.options.installSignalHandlers ?? true) {
      this.setupShutdownHandlers();
    }

    this.isRunning = true;
    this.eventBus.publish(EventTypes.SYSTEM_STARTED, {
      version: APP_VERSION,
      updaters: this.updaters.map((updater) => updater.name),
    });

    if (this.config.app.runOnce) {
      await this.scheduler.runOnce();
      await this.shutdown('run-once');
      return;
    }

    this.scheduler.start();
  }

  private subscribeToEvents(): void {
    if (this.config.app.logLevel === 'trace') {
      this.eventBus.enableDebugLogging();
    }

    this.unsubscribers.push(
      this.eventBus.subscribe(EventTypes.DDNS_USER_ERROR, ({ username, hostnames, codes }) => {
        logger.error(
          { username, hostnames, codes },
          'Provider rejected the account; fix the configuration or account before the next pass, retrying will not help'
        );
      })
    );
  }

  /**
   * Setup graceful shutdown handlers
   */
  private setupShutdownHandlers(): void {
    const shutdown = async (signal: string, exitCode: number): Promise<void> => {
      if (this.shutdownPromise) {
        logger.info('Shutdown already in progress');
        await this.shutdownPromise;
        return;
      }

      logger.info({ signal }, 'Shutdown signal received');
      await this.shutdown(signal);
      process.exit(exitCode);
    };

    process.on('SIGTERM', () => void shutdown('SIGTERM', 0));
    process.on('SIGINT', () => void shutdown('SIGINT', 0));

    process.on('uncaughtException', (error) => {
      logger.fatal({ error }, 'Uncaught exception');
      void shutdown('uncaughtException', 1);
    });

    process.on('unhandledRejection', (reason) => {
      logger.fatal({ reason }, 'Unhandled rejection');
      void shutdown('unhandledRejection', 1);
    });
  }

  /**
   * Stop the update loop after the running pass completes
   */
  shutdown(reason: string = 'manual'): Promise<void> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = this.doShutdown(reason);
    }
    return this.shutdownPromise;
  }

  private async doShutdown(reason: string): Promise<void> {
    if (!this.isRunning) {
      return;
    }

    logger.info({ reason }, `${symbols.shutdown} Shutting down ddns-sync`);
    this.eventBus.publish(EventTypes.SYSTEM_SHUTDOWN, { reason });

    await this.scheduler.stop();

    for (const unsubscribe of this.unsubscribers) {
      unsubscribe();
    }
    this.unsubscribers = [];
    this.eventBus.removeAllListeners();

    this.isRunning = false;
    logger.info('Shutdown complete');
  }

  get running(): boolean {
    return this.isRunning;
  }
}

export function createApplication(options?: ApplicationOptions): Application {
  return new Application(options);
}
