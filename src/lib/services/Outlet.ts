import { buildControlParams } from "@/lib/api/client";
import type { ControlCommandParams } from "@/lib/api/types";
import { isConnectivityError, isProtocolError, type ProtocolError } from "@/lib/domain/errors";
import type { OutletSnapshot } from "@/lib/domain/models";
import type { WattBoxLogger } from "@/lib/utils/logger";

/**
 * What an outlet needs from the device that owns it. The device hands each
 * outlet a private instance; none of it is reachable from the device's own
 * public surface.
 */
export interface OutletHost {
  readonly simulateOnly: boolean;
  readonly logger: WattBoxLogger;
  /** Device name for log lines: the reported hostname once loaded, else the host. */
  readonly label: string;
  commandUrl(params: ControlCommandParams): string;
  sendControl(params: ControlCommandParams): Promise<string>;
  /** The outlet currently at this index; a reload replaces every outlet object. */
  outletAt(outletIndex: number): Outlet | undefined;
  /** Reconciliation inside a task already running on the device queue. */
  reconcile(responseBody?: string): Promise<void>;
  exclusive<T>(task: () => Promise<T>): Promise<T>;
}

/** A single IP-controlled outlet that can be turned on or off. */
export class Outlet {
  readonly outletIndex: number;
  private name: string;
  private on: boolean;

  constructor(
    private readonly device: OutletHost,
    outletIndex: number,
    reportedName: string,
    isOn: boolean,
  ) {
    this.outletIndex = outletIndex;
    this.name = `${reportedName} [${outletIndex}]`;
    this.on = isOn;
  }

  get displayName(): string {
    return this.name;
  }

  get isOn(): boolean {
    return this.on;
  }

  rename(newName: string): void {
    this.name = newName;
  }

  /** @internal Written by the owning device during reconciliation. */
  applyState(isOn: boolean): void {
    this.on = isOn;
  }

  /**
   * Switches the outlet and resolves `true` once the command went out (or was
   * simulated). Resolves `false` without touching `isOn` when the device could
   * not be reached.
   *
   * After a successful send the requested state is kept locally even if the
   * device's reply reports otherwise. If that reply cannot be reconciled the
   * requested state is still kept and the ProtocolError is rethrown.
   */
  setState(turnOn: boolean): Promise<boolean> {
    return this.device.exclusive(async () => {
      const { logger } = this.device;
      const target = this.device.outletAt(this.outletIndex) ?? this;
      const wasOn = target.on;
      const params = buildControlParams(this.outletIndex, turnOn);
      logger.debug(`Sending wattbox ${this.device.label} url ${this.device.commandUrl(params)}`);

      let reconcileError: ProtocolError | undefined;
      if (this.device.simulateOnly) {
        logger.info(`Not sending outlet command to ${this.device.label} (simulate only)`);
      } else {
        let body: string;
        try {
          body = await this.device.sendControl(params);
        } catch (error) {
          if (isConnectivityError(error)) {
            logger.warn(`Command to ${this.name} on ${this.device.label} not sent: ${error.message}`);
            return false;
          }
          throw error;
        }

        logger.debug(`Wattbox responded '${body}'`);
        try {
          await this.device.reconcile(body);
        } catch (error) {
          if (!isProtocolError(error)) {
            throw error;
          }
          reconcileError = error;
        }
      }

      target.on = turnOn;
      this.on = turnOn;
      if (wasOn !== target.on) {
        logger.info(`Updated wattbox ${this.device.label}: ${target.toString()}`);
      }
      if (reconcileError) {
        throw reconcileError;
      }
      return true;
    });
  }

  turnOn(): Promise<boolean> {
    return this.setState(true);
  }

  turnOff(): Promise<boolean> {
    return this.setState(false);
  }

  /** Debounced refresh of every outlet; resolves `true` when this outlet changed. */
  refresh(): Promise<boolean> {
    return this.device.exclusive(async () => {
      const target = this.device.outletAt(this.outletIndex) ?? this;
      const wasOn = target.on;
      await this.device.reconcile();
      this.on = target.on;
      const changed = wasOn !== target.on;
      if (changed) {
        this.device.logger.info(`Updated wattbox ${this.device.label}: ${target.toString()}`);
      }
      return changed;
    });
  }

  snapshot(): OutletSnapshot {
    return Object.freeze({
      displayName: this.name,
      outletIndex: this.outletIndex,
      isOn: this.on,
    });
  }

  toString(): string {
    return `WattBox outlet ${this.name} (${this.on ? "on" : "off"})`;
  }

  toJSON(): { name: string; on: boolean } {
    return { name: this.name, on: this.on };
  }
}
