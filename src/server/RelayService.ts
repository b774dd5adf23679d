/**
 * Relay Service
 *
 * Builds the source, retrieval, delivery, ledger and listener out of a
 * RelayConfig and runs the discovery loop over them.
 */

import { RelayError } from '../errors.js';
import { getLogger, registerComponent } from '../logging/index.js';
import type { AssociationService, RemoteNode } from '../association/AssociationService.js';
import { DimseAssociationService } from '../association/DimseAssociationService.js';
import { RelayConfig, validateRelayConfig } from '../config/RelayConfig.js';
import { DicomWebClient } from '../dicomweb/DicomWebClient.js';
import { OrthancClient } from '../dicomweb/OrthancClient.js';
import { DedupLedger } from '../ledger/DedupLedger.js';
import { InboundObjectReceiver } from '../receiver/InboundObjectReceiver.js';
import { DeliveryStrategy, FolderDelivery, StoreDelivery, StowDelivery } from '../relay/DeliveryStrategy.js';
import { RelayEngine } from '../relay/RelayEngine.js';
import { MoveRetrieval, RetrievalStrategy, WadoRetrieval } from '../relay/RetrievalStrategy.js';
import { DicomWebStudySource, DimseStudySource, OrthancStudySource, StudySource } from '../relay/StudySource.js';
import { CycleResult, StudyPoller } from '../relay/StudyPoller.js';
import { TransferTracker } from '../relay/TransferTracker.js';
import type { StudyRecord } from '../relay/types.js';

registerComponent('relay-service', 'Relay lifecycle');
const logger = getLogger('relay-service');

/**
 * Collaborators the service would otherwise build from the config
 */
export interface RelayServiceDeps {
  associations?: AssociationService;
  source?: StudySource;
  retrieval?: RetrievalStrategy;
  delivery?: DeliveryStrategy;
}

export class RelayService {
  readonly ledger: DedupLedger;
  readonly tracker = new TransferTracker();
  readonly receiver: InboundObjectReceiver;
  readonly engine: RelayEngine;
  readonly source: StudySource;
  private readonly associations: AssociationService;
  private readonly poller: StudyPoller;
  private readonly needsListener: boolean;
  private listenerPort: number | null = null;
  private ledgerLoad: Promise<void> | null = null;
  private started = false;

  constructor(
    private readonly config: RelayConfig,
    deps: RelayServiceDeps = {}
  ) {
    const problems = validateRelayConfig(config);
    if (problems.length > 0) {
      throw new RelayError(`Invalid configuration: ${problems.join('; ')}`);
    }

    this.associations =
      deps.associations ?? new DimseAssociationService({ localAeTitle: config.localAeTitle });
    this.ledger = new DedupLedger(config.ledgerPath);
    this.receiver = new InboundObjectReceiver(config.outputDir, this.tracker);
    this.source = deps.source ?? this.buildSource();
    const retrieval = deps.retrieval ?? this.buildRetrieval();
    const delivery = deps.delivery ?? this.buildDelivery();
    this.needsListener = config.retrieve === 'move' && !deps.retrieval;

    this.engine = new RelayEngine(retrieval, delivery, this.ledger, {
      retryBackoffMaxMs: config.retryBackoffMaxMs,
    });
    this.poller = new StudyPoller(
      this.source,
      this.engine,
      (study) => this.engine.relay(study),
      { pollIntervalMs: config.pollIntervalMs }
    );
  }

  /**
   * Port the storage listener is bound to, if it runs
   */
  getListenerPort(): number | null {
    return this.listenerPort;
  }

  isRunning(): boolean {
    return this.started;
  }

  /**
   * Load the ledger (once per service) and bring up the listener when C-MOVE
   * needs it
   */
  async prepare(): Promise<void> {
    if (!this.ledgerLoad) {
      this.ledgerLoad = this.loadLedger();
    }
    await this.ledgerLoad;
    if (this.needsListener && this.listenerPort === null) {
      this.associations.registerInboundHandler((object) => this.receiver.handle(object));
      this.listenerPort = await this.associations.startListener(this.config.listenPort);
      logger.info(`Accepting C-MOVE sub-operations as ${this.config.localAeTitle} on port ${this.listenerPort}`);
    }
  }

  /**
   * Run discovery until stop()
   */
  async start(): Promise<void> {
    if (this.started) {
      throw new RelayError('Relay is already running');
    }
    await this.prepare();
    logger.info(
      `Relaying ${this.source.description} -> ${this.config.destination.kind} (retrieve via ${this.config.retrieve})`
    );
    this.poller.start();
    this.started = true;
  }

  /**
   * Single discovery cycle, for --once and tests
   */
  async runOnce(): Promise<CycleResult> {
    await this.prepare();
    return this.poller.runOnce();
  }

  /**
   * Relay one study by UID now, without discovery or a ledger lookup.
   * Success still commits the UID.
   */
  async forward(studyInstanceUID: string): Promise<StudyRecord> {
    await this.prepare();
    if (this.ledger.contains(studyInstanceUID)) {
      logger.info(`Study ${studyInstanceUID} is in the ledger; sending it again`);
    }
    return this.engine.relay({ studyIdentifier: studyInstanceUID, studyInstanceUID });
  }

  async stop(): Promise<void> {
    await this.poller.stop();
    if (this.listenerPort !== null) {
      await this.associations.stopListener();
      this.listenerPort = null;
    }
    if (this.started) {
      logger.info('Relay stopped');
    }
    this.started = false;
  }

  private async loadLedger(): Promise<void> {
    const processed = await this.ledger.load();
    logger.info(`${processed.size} studies already relayed (${this.ledger.path})`);
  }

  private sourceNode(): RemoteNode {
    const { host, port, aeTitle } = this.config.source;
    return { host, port, aeTitle };
  }

  private requireUrl(url: string | undefined, label: string): string {
    if (!url) {
      throw new RelayError(`${label} URL is not configured`);
    }
    return url;
  }

  private buildSource(): StudySource {
    const { source, httpTimeoutMs } = this.config;
    switch (source.kind) {
      case 'dicomweb':
        return new DicomWebStudySource(
          new DicomWebClient({ baseUrl: this.requireUrl(source.url, 'Source'), timeout: httpTimeoutMs })
        );
      case 'orthanc': {
        const baseUrl = this.requireUrl(source.url, 'Source');
        return new OrthancStudySource(new OrthancClient({ baseUrl, timeout: httpTimeoutMs }), baseUrl);
      }
      case 'dimse':
        return new DimseStudySource(this.associations, this.sourceNode());
    }
  }

  private buildRetrieval(): RetrievalStrategy {
    const { source, retrieve, httpTimeoutMs } = this.config;
    if (retrieve === 'wado') {
      return new WadoRetrieval(
        new DicomWebClient({ baseUrl: this.requireUrl(source.url, 'Source'), timeout: httpTimeoutMs })
      );
    }
    return new MoveRetrieval(this.associations, this.sourceNode(), this.tracker, {
      localAeTitle: this.config.localAeTitle,
      quiescenceMs: this.config.moveQuiescenceMs,
      timeoutMs: this.config.moveTimeoutMs,
    });
  }

  private buildDelivery(): DeliveryStrategy {
    const { destination, httpTimeoutMs } = this.config;
    switch (destination.kind) {
      case 'dicomweb':
        return new StowDelivery(
          new DicomWebClient({ baseUrl: this.requireUrl(destination.url, 'Destination'), timeout: httpTimeoutMs })
        );
      case 'dimse':
        return new StoreDelivery(this.associations, {
          host: destination.host,
          port: destination.port,
          aeTitle: destination.aeTitle,
        });
      case 'folder':
        return new FolderDelivery(this.receiver);
    }
  }
}
