import {Db, LevelDbController} from "@warden/db";
import {BLSPubkey, Slot} from "@warden/types";
import {Logger, MetricsRegister} from "@warden/utils";
import {getValidatorLogger} from "./logger.js";
import {Metrics, getMetrics} from "./metrics.js";
import {ValidatorOptions, parseValidatorOptions} from "./options.js";
import {AttestationOutcome, AttestationService} from "./services/attestation.js";
import {AttestationLog} from "./services/attestationLog.js";
import {AttestationSigner, Custody, DomainSource} from "./services/signer.js";
import {SlashingProtection} from "./slashingProtection/index.js";
import {BeaconApi, DutySource} from "./types.js";

export type ValidatorModules = {
  opts?: Partial<ValidatorOptions>;
  api: BeaconApi;
  dutySource: DutySource;
  domainSource: DomainSource;
  custody: Custody;
  /** Defaults to a logger configured by LOG_LEVEL, LOG_FORMAT and `opts.logFile` */
  logger?: Logger;
  register?: MetricsRegister | null;
  /** Defaults to a LevelDB database at `opts.dbPath` */
  controller?: Db;
};

enum Status {
  running,
  closed,
}

/**
 * Main class for the Validator client.
 */
export class Validator {
  readonly opts: ValidatorOptions;
  readonly slashingProtection: SlashingProtection;
  readonly metrics: Metrics | null;
  private readonly attestationService: AttestationService;
  private readonly logger: Logger;
  private readonly controller = new AbortController();
  private state = Status.closed;

  private constructor(
    opts: ValidatorOptions,
    slashingProtection: SlashingProtection,
    attestationService: AttestationService,
    logger: Logger,
    metrics: Metrics | null
  ) {
    this.opts = opts;
    this.slashingProtection = slashingProtection;
    this.attestationService = attestationService;
    this.logger = logger;
    this.metrics = metrics;
  }

  get isRunning(): boolean {
    return this.state === Status.running;
  }

  /**
   * Wire every service from options. The database is not opened until `start`
   */
  static initializeFromOptions(modules: ValidatorModules): Validator {
    const opts = parseValidatorOptions(modules.opts);
    const logger = modules.logger ?? getValidatorLogger(opts);
    const metrics = modules.register ? getMetrics(modules.register) : null;

    const controller = modules.controller ?? new LevelDbController({name: opts.dbPath}, {metrics: metrics?.db});
    const slashingProtection = new SlashingProtection({
      controller,
      weakSubjectivityPeriod: opts.weakSubjectivityPeriod,
    });

    const attestationService = new AttestationService({
      api: modules.api,
      dutySource: modules.dutySource,
      signer: new AttestationSigner(modules.domainSource, modules.custody),
      slashingProtection,
      logger,
      metrics,
      opts,
      attestationLog: new AttestationLog(),
    });

    return new Validator(opts, slashingProtection, attestationService, logger, metrics);
  }

  async start(): Promise<void> {
    if (this.state === Status.running) return;
    await this.slashingProtection.start();
    this.state = Status.running;
    this.logger.info("Validator started", {
      protectAttester: this.opts.protectAttester,
      attestationMode: this.opts.attestationMode,
      weakSubjectivityPeriod: this.opts.weakSubjectivityPeriod,
    });
  }

  /**
   * Abort attempts that have not submitted yet, wait for the ones already submitting to commit
   * their votes, then close the database
   */
  async stop(): Promise<void> {
    if (this.state === Status.closed) return;
    this.state = Status.closed;
    this.controller.abort();
    await this.attestationService.waitForPendingAttempts();
    await this.slashingProtection.stop();
    this.logger.info("Validator stopped");
  }

  async runAttestationDuties(slot: Slot): Promise<AttestationOutcome[]> {
    return this.attestationService.runAttestationDuties(slot, this.controller.signal);
  }

  async submitAttestation(slot: Slot, pubkey: BLSPubkey): Promise<AttestationOutcome> {
    return this.attestationService.submitAttestation(slot, pubkey, this.controller.signal);
  }

  async flushAttestationLogs(): Promise<void> {
    await this.attestationService.flushAttestationLogs();
  }
}
