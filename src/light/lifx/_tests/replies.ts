import { LABEL_SIZE, MessageType, encodePacket } from "../protocol";

// Réponses émises par une ampoule, pour simuler l'autre côté du protocole.

export const BULB_MAC = "d0:73:d5:01:02:03";

export function encodeStateServicePayload(service: number, port: number): Buffer {
  const buf = Buffer.alloc(5);
  buf.writeUInt8(service, 0);
  buf.writeUInt32LE(port, 1);
  return buf;
}

export function encodeStateLabelPayload(label: string): Buffer {
  const buf = Buffer.alloc(LABEL_SIZE);
  buf.write(label, 0, LABEL_SIZE, "utf8");
  return buf;
}

export function encodeStateVersionPayload(vendor: number, product: number): Buffer {
  const buf = Buffer.alloc(12);
  buf.writeUInt32LE(vendor, 0);
  buf.writeUInt32LE(product, 4);
  return buf;
}

export function stateService(source: number, sequence: number): Buffer {
  return encodePacket({
    type: MessageType.StateService,
    source,
    sequence,
    target: BULB_MAC,
    payload: encodeStateServicePayload(1, 56700),
  });
}

export function stateLabel(source: number, sequence: number, label: string): Buffer {
  return encodePacket({
    type: MessageType.StateLabel,
    source,
    sequence,
    target: BULB_MAC,
    payload: encodeStateLabelPayload(label),
  });
}

export function stateVersion(source: number, sequence: number, product: number): Buffer {
  return encodePacket({
    type: MessageType.StateVersion,
    source,
    sequence,
    target: BULB_MAC,
    payload: encodeStateVersionPayload(1, product),
  });
}
