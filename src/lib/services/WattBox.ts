import { HttpTransport } from "@/lib/adapters/httpTransport";
import { WattBoxApiClient, parseDeviceStatus, parseOutletStates } from "@/lib/api/client";
import type { ControlCommandParams } from "@/lib/api/types";
import { REFRESH_DEBOUNCE_MS } from "@/lib/domain/constants";
import { ProtocolError, WattBoxError } from "@/lib/domain/errors";
import type {
  DeviceMetadata,
  DeviceStatus,
  WattBoxOptions,
  WattBoxSnapshot,
} from "@/lib/domain/models";
import { Outlet, type OutletHost } from "@/lib/services/Outlet";
import { formatTimestamp } from "@/lib/utils/date";
import { defaultLogger, type WattBoxLogger } from "@/lib/utils/logger";
import { SerialQueue } from "@/lib/utils/serial";

/**
 * A WattBox power strip.
 *
 * Owns the connection parameters, the metadata from the last full load and
 * the outlet collection. Constructing one makes no request; call
 * {@link WattBox.loadFullStatus} first.
 *
 * Mutating operations on one instance run one at a time, in call order.
 */
export class WattBox {
  readonly host: string;
  readonly area: string;
  readonly simulateOnly: boolean;
  readonly logger: WattBoxLogger;

  private readonly client: WattBoxApiClient;
  private readonly queue = new SerialQueue();
  private metadata?: DeviceMetadata;
  private updatedAt?: Date;
  private outletList: Outlet[] = [];
  private readonly outletHost: OutletHost;

  constructor(options: WattBoxOptions) {
    this.host = options.host;
    this.area = options.area ?? "";
    this.simulateOnly = options.simulateOnly ?? false;
    this.logger = options.logger ?? defaultLogger;

    const transport =
      options.transport ??
      new HttpTransport({
        host: options.host,
        username: options.username,
        password: options.password,
        protocol: options.protocol,
        timeout: options.timeoutMs,
      });
    this.client = new WattBoxApiClient(transport);
    this.outletHost = this.createOutletHost();
  }

  get label(): string {
    return this.metadata?.hostname ?? this.host;
  }

  get hostname(): string | undefined {
    return this.metadata?.hostname;
  }

  get hardwareVersion(): string | undefined {
    return this.metadata?.hardwareVersion;
  }

  get serialNumber(): string | undefined {
    return this.metadata?.serialNumber;
  }

  get hasUps(): boolean | undefined {
    return this.metadata?.hasUps;
  }

  get voltage(): number | undefined {
    return this.metadata?.voltage;
  }

  get current(): number | undefined {
    return this.metadata?.current;
  }

  get power(): number | undefined {
    return this.metadata?.power;
  }

  get cloudStatus(): boolean | undefined {
    return this.metadata?.cloudStatus;
  }

  get lastUpdated(): Date | undefined {
    return this.updatedAt;
  }

  get outlets(): readonly Outlet[] {
    return this.outletList;
  }

  /** 1-based lookup. */
  getOutlet(outletIndex: number): Outlet | undefined {
    return this.outletList[outletIndex - 1];
  }

  /**
   * Fetches wattbox_info.xml and replaces the metadata and the whole outlet
   * collection. Nothing changes when the request or the parse fails.
   */
  loadFullStatus(signal?: AbortSignal): Promise<WattBoxSnapshot> {
    return this.queue.run(async () => {
      const body = await this.logFailure("load status from", () =>
        this.client.fetchStatusDocument(signal),
      );
      this.logger.debug(`Loaded xml status = ${body}`);

      const status: DeviceStatus = await this.logFailure("parse status from", () =>
        Promise.resolve(parseDeviceStatus(body)),
      );

      this.metadata = status.metadata;
      this.outletList = status.outlets.map(
        (outlet, index) => new Outlet(this.outletHost, index + 1, outlet.name, outlet.isOn),
      );
      this.updatedAt = new Date();
      this.logger.debug(`Found wattbox with ${this.outletList.length} outlets`);
      return this.snapshot();
    });
  }

  /**
   * Reconciles every outlet's on/off state.
   *
   * Without a body the refresh is skipped when the last one is under three
   * seconds old, and otherwise polls control.cgi (or does nothing in
   * simulate-only mode). With a body, that body is applied directly.
   */
  refreshOutletStates(responseBody?: string): Promise<void> {
    return this.queue.run(() => this.reconcileOutletStates(responseBody));
  }

  private async reconcileOutletStates(responseBody?: string): Promise<void> {
    let body = responseBody;
    if (body === undefined) {
      if (this.updatedAt && Date.now() - this.updatedAt.getTime() < REFRESH_DEBOUNCE_MS) {
        return;
      }
      this.logger.debug(`update Sending wattbox ${this.label} url ${this.client.commandUrl()}`);
      if (this.simulateOnly) {
        this.logger.info(`Not sending status request to ${this.label} (simulate only)`);
        return;
      }
      body = await this.logFailure("refresh outlets from", () => this.client.sendControl());
    }

    const payload = body;
    const states = await this.logFailure("parse outlet status from", () =>
      Promise.resolve(parseOutletStates(payload)),
    );
    if (states.length !== this.outletList.length) {
      const error = new ProtocolError(
        `Bad outlet_status length ${states.length} not equal to outlet count ${this.outletList.length}: ${payload}`,
        "OUTLET_COUNT_MISMATCH",
        payload,
      );
      this.logger.warn(error.message);
      throw error;
    }

    this.outletList.forEach((outlet, index) => {
      outlet.applyState(states[index] ?? outlet.isOn);
    });
    this.updatedAt = new Date();
  }

  snapshot(): WattBoxSnapshot {
    return Object.freeze({
      host: this.host,
      area: this.area,
      simulateOnly: this.simulateOnly,
      metadata: this.metadata ? Object.freeze({ ...this.metadata }) : undefined,
      lastUpdated: this.updatedAt ? new Date(this.updatedAt) : undefined,
      outlets: Object.freeze(this.outletList.map((outlet) => outlet.snapshot())),
    });
  }

  /** Releases the HTTP connection pool. */
  async close(): Promise<void> {
    await this.client.close();
  }

  toString(): string {
    const updated = this.updatedAt ? formatTimestamp(this.updatedAt) : "never";
    return `WattBox ${this.label} (${this.outletList.length} outlets, updated ${updated})`;
  }

  /** The queue and the unqueued reconciliation are reachable only through outlets. */
  private createOutletHost(): OutletHost {
    const device = this;
    return {
      simulateOnly: this.simulateOnly,
      logger: this.logger,
      get label() {
        return device.label;
      },
      commandUrl: (params: ControlCommandParams) => this.client.commandUrl(params),
      sendControl: (params: ControlCommandParams) => this.client.sendControl(params),
      outletAt: (outletIndex: number) => this.getOutlet(outletIndex),
      reconcile: (responseBody?: string) => this.reconcileOutletStates(responseBody),
      exclusive: <T>(task: () => Promise<T>) => this.queue.run(task),
    };
  }

  private async logFailure<T>(action: string, task: () => Promise<T>): Promise<T> {
    try {
      return await task();
    } catch (error) {
      if (error instanceof WattBoxError) {
        this.logger.warn(`Could not ${action} WattBox ${this.label}: ${error.message}`);
      }
      throw error;
    }
  }
}
