import dgram from "dgram";
import { randomInt } from "crypto";
import { createLogger } from "../../logger";
import { DeviceNotFoundError, DiscoveryAbortedError } from "../../errors";
import {
  LIFX_PORT,
  MessageType,
  SERVICE_UDP,
  decodePacket,
  decodeStateLabel,
  decodeStateService,
  decodeStateVersion,
  encodePacket,
  encodeSetColorPayload,
} from "./protocol";
import type { LifxPacket } from "./protocol";
import type { ColorCommand, LightConnection, LightConnector } from "../../types";

const log = createLogger("lifx");

export interface RemoteInfo {
  address: string;
  port: number;
}

/** Sous‑ensemble de `dgram.Socket` utilisé ici. */
export interface LifxSocket {
  on(event: "message", listener: (msg: Buffer, rinfo: RemoteInfo) => void): unknown;
  on(event: "error", listener: (err: Error) => void): unknown;
  bind(callback: () => void): unknown;
  setBroadcast(flag: boolean): void;
  send(msg: Buffer, port: number, address: string, callback?: (err: Error | null) => void): void;
  close(callback?: () => void): unknown;
}

export interface LifxConnectorOptions {
  /** IP de l'ampoule (découverte unicast); sinon diffusion */
  address?: string;
  /** Adresse de diffusion. Défaut: 255.255.255.255 */
  broadcast?: string;
  /** Port UDP des ampoules. Défaut: 56700 */
  port?: number;
  discoveryTimeoutMs?: number;
  discoveryIntervalMs?: number;
  labelTimeoutMs?: number;
  /** Identifiant client (non nul) renvoyé par l'ampoule dans ses réponses */
  source?: number;
  createSocket?: () => LifxSocket;
}

interface Received {
  packet: LifxPacket;
  rinfo: RemoteInfo;
}

interface Discovered {
  address: string;
  port: number;
  mac: string;
}

/**
 * Transport UDP partagé entre découverte et connexion établie.
 * Les réponses sont corrélées par type de message et par `source`.
 */
class LifxTransport {
  private sequence = 0;
  private readonly waiters = new Map<number, Array<(r: Received) => void>>();
  private bindError: ((err: Error) => void) | null = null;
  private closed = false;

  constructor(readonly socket: LifxSocket, readonly source: number) {
    socket.on("message", (msg, rinfo) => this.onMessage(msg, rinfo));
    socket.on("error", (err) => {
      if (this.bindError) this.bindError(err);
      else log.warn("Erreur socket UDP:", err);
    });
  }

  bind(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.bindError = reject;
      this.socket.bind(() => {
        this.bindError = null;
        resolve();
      });
    });
  }

  send(
    type: number,
    address: string,
    port: number,
    opts: { target?: string; tagged?: boolean; resRequired?: boolean; payload?: Buffer } = {}
  ): void {
    if (this.closed) return;
    this.sequence = (this.sequence + 1) & 0xff;
    const buf = encodePacket({ type, source: this.source, sequence: this.sequence, ...opts });
    this.socket.send(buf, port, address, (err) => {
      if (err) log.warn(`Envoi UDP vers ${address}:${port} échoué:`, err);
    });
  }

  /** Résout avec la prochaine réponse de ce type, ou null après `timeoutMs` ou sur `signal`. */
  waitFor(type: number, timeoutMs: number, signal?: AbortSignal): Promise<Received | null> {
    return new Promise((resolve) => {
      const finish = (r: Received | null): void => {
        clearTimeout(timer);
        signal?.removeEventListener("abort", expire);
        resolve(r);
      };
      const handler = (r: Received): void => finish(r);
      const expire = (): void => {
        const list = this.waiters.get(type) ?? [];
        this.waiters.set(type, list.filter((h) => h !== handler));
        finish(null);
      };
      const timer = setTimeout(expire, timeoutMs);
      this.waiters.set(type, [...(this.waiters.get(type) ?? []), handler]);
      signal?.addEventListener("abort", expire, { once: true });
    });
  }

  close(): Promise<void> {
    if (this.closed) return Promise.resolve();
    this.closed = true;
    return new Promise<void>((resolve) => {
      this.socket.close(() => resolve());
    });
  }

  private onMessage(msg: Buffer, rinfo: RemoteInfo): void {
    const packet = decodePacket(msg);
    if (!packet) {
      log.trace(`Trame ignorée de ${rinfo.address} (${msg.length} octets)`);
      return;
    }
    if (packet.source !== this.source) return;
    const handlers = this.waiters.get(packet.type);
    if (!handlers || handlers.length === 0) return;
    this.waiters.delete(packet.type);
    for (const h of handlers) h({ packet, rinfo });
  }
}

/**
 * Ampoule LIFX connectée. Les commandes partent sans demande d'accusé ni de réponse.
 */
export class LifxLight implements LightConnection {
  constructor(
    private readonly transport: LifxTransport,
    readonly address: string,
    readonly port: number,
    readonly mac: string,
    readonly label: string,
    readonly product: string | undefined
  ) {}

  sendColor(command: ColorCommand): void {
    this.transport.send(MessageType.SetColor, this.address, this.port, {
      target: this.mac,
      payload: encodeSetColorPayload(command),
    });
  }

  close(): Promise<void> {
    return this.transport.close();
  }
}

/**
 * Découverte de la première ampoule LIFX qui répond (GetService → StateService),
 * puis lecture de son libellé (GetLabel → StateLabel) et de son modèle (GetVersion → StateVersion).
 */
export class LifxConnector implements LightConnector {
  private readonly opts: Required<Omit<LifxConnectorOptions, "address">> & { address?: string };

  constructor(options: LifxConnectorOptions = {}) {
    this.opts = {
      address: options.address,
      broadcast: options.broadcast ?? "255.255.255.255",
      port: options.port ?? LIFX_PORT,
      discoveryTimeoutMs: options.discoveryTimeoutMs ?? 10_000,
      discoveryIntervalMs: options.discoveryIntervalMs ?? 1_000,
      labelTimeoutMs: options.labelTimeoutMs ?? 3_000,
      source: options.source ?? randomInt(2, 0xffffffff),
      createSocket: options.createSocket ?? (() => dgram.createSocket("udp4")),
    };
  }

  /**
   * @throws DeviceNotFoundError si aucune ampoule ne répond avant `discoveryTimeoutMs`
   * @throws DiscoveryAbortedError si `signal` est déclenché avant la fin
   */
  async connect(signal?: AbortSignal): Promise<LifxLight> {
    const transport = new LifxTransport(this.opts.createSocket(), this.opts.source);
    try {
      await transport.bind();
      if (!this.opts.address) transport.socket.setBroadcast(true);
      const found = await this.discover(transport, signal);
      const [label, product] = await Promise.all([
        this.queryLabel(transport, found, signal),
        this.queryProduct(transport, found, signal),
      ]);
      if (signal?.aborted) throw new DiscoveryAbortedError();
      return new LifxLight(transport, found.address, found.port, found.mac, label, product);
    } catch (err) {
      await transport.close();
      throw err;
    }
  }

  private async discover(transport: LifxTransport, signal?: AbortSignal): Promise<Discovered> {
    const target = this.opts.address ?? this.opts.broadcast;
    const started = Date.now();
    log.debug(`Recherche d'une ampoule via ${target}:${this.opts.port}…`);
    for (;;) {
      if (signal?.aborted) throw new DiscoveryAbortedError();
      const remaining = this.opts.discoveryTimeoutMs - (Date.now() - started);
      if (remaining <= 0) throw new DeviceNotFoundError(this.opts.discoveryTimeoutMs, target);
      transport.send(MessageType.GetService, target, this.opts.port, { tagged: true });
      const reply = await transport.waitFor(
        MessageType.StateService,
        Math.min(this.opts.discoveryIntervalMs, remaining),
        signal
      );
      if (!reply) continue;
      const service = decodeStateService(reply.packet.payload);
      if (service && service.service === SERVICE_UDP) {
        log.info(`Ampoule trouvée à ${reply.rinfo.address} (${reply.packet.target})`);
        return { address: reply.rinfo.address, port: service.port, mac: reply.packet.target };
      }
    }
  }

  private async queryLabel(transport: LifxTransport, found: Discovered, signal?: AbortSignal): Promise<string> {
    transport.send(MessageType.GetLabel, found.address, found.port, { target: found.mac, resRequired: true });
    const reply = await transport.waitFor(MessageType.StateLabel, this.opts.labelTimeoutMs, signal);
    if (!reply) {
      if (signal?.aborted) return found.mac;
      log.warn(`Libellé de l'ampoule ${found.mac} non reçu après ${this.opts.labelTimeoutMs}ms`);
      return found.mac;
    }
    return decodeStateLabel(reply.packet.payload);
  }

  private async queryProduct(
    transport: LifxTransport,
    found: Discovered,
    signal?: AbortSignal
  ): Promise<string | undefined> {
    transport.send(MessageType.GetVersion, found.address, found.port, { target: found.mac, resRequired: true });
    const reply = await transport.waitFor(MessageType.StateVersion, this.opts.labelTimeoutMs, signal);
    const version = reply ? decodeStateVersion(reply.packet.payload) : null;
    if (!version) {
      log.debug(`Version de l'ampoule ${found.mac} non reçue`);
      return undefined;
    }
    return `LIFX #${version.product}`;
  }
}
