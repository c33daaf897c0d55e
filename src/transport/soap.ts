import { XMLBuilder, XMLParser } from 'fast-xml-parser';
import type { ActionArguments, DeviceDescription, QueryResult, ResultValue, ServiceDescription } from '../types/tr064.types';

/**
 * Error raised for a failed TR-064 action: SOAP fault, unknown service,
 * malformed response or transport failure
 */
export class Tr064Error extends Error {
  readonly errorCode?: number;

  constructor(message: string, errorCode?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'Tr064Error';
    this.errorCode = errorCode;
  }
}

const parser = new XMLParser({ ignoreAttributes: true, removeNSPrefix: true, parseTagValue: false });

const builder = new XMLBuilder({ ignoreAttributes: false, attributeNamePrefix: '@' });

type XmlNode = Record<string, unknown>;

function isNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function child(node: unknown, name: string): unknown {
  return isNode(node) ? node[name] : undefined;
}

function toArray(value: unknown): unknown[] {
  if (value === undefined || value === null || value === '') return [];
  return Array.isArray(value) ? value : [value];
}

function toText(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (Array.isArray(value)) return toText(value[0]);
  return isNode(value) ? toText(value['#text']) : undefined;
}

/**
 * @throws Tr064Error if the document is not well-formed
 */
function parseXml(xml: string): unknown {
  try {
    const document: unknown = parser.parse(xml);
    return document;
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    throw new Tr064Error(`Malformed XML: ${message}`, undefined, { cause: error });
  }
}

/**
 * Decimal text becomes a number, anything else stays text
 */
function toResultValue(text: string): ResultValue {
  const value = text.trim();
  if (/^-?\d+(\.\d+)?$/.test(value)) {
    return Number(value);
  }
  return value;
}

/**
 * Short name of a service type:
 * "urn:dslforum-org:service:WANIPConnection:1" -> "WANIPConnection"
 */
export function serviceName(serviceType: string): string {
  const match = serviceType.match(/:service:([^:]+)(?::\d+)?$/);
  return match ? match[1] : serviceType.replace(/:\d+$/, '');
}

export function buildEnvelope(serviceType: string, action: string, args: ActionArguments = {}): string {
  const actionXml: string = builder.build({ [`u:${action}`]: { '@xmlns:u': serviceType, ...args } });

  return `<?xml version="1.0" encoding="utf-8"?>
<s:Envelope s:encodingStyle="http://schemas.xmlsoap.org/soap/encoding/" xmlns:s="http://schemas.xmlsoap.org/soap/envelope/">
<s:Body>
${actionXml}
</s:Body>
</s:Envelope>`;
}

/**
 * Extract the output arguments of `<action>Response` from a SOAP envelope
 * @throws Tr064Error if the envelope holds no response element for the action
 */
export function parseActionResponse(xml: string, action: string): QueryResult {
  const body = child(child(parseXml(xml), 'Envelope'), 'Body');
  const response = child(body, `${action}Response`);

  if (response === undefined) {
    throw new Tr064Error(`Response for ${action} is missing from SOAP envelope`);
  }

  const result: Record<string, ResultValue> = {};
  if (!isNode(response)) {
    return result;
  }

  for (const [name, value] of Object.entries(response)) {
    const text = toText(value);
    if (text !== undefined && name !== '#text') {
      result[name] = toResultValue(text);
    }
  }

  return result;
}

/**
 * Read the UPnP error of a SOAP fault, if the document is one
 * @throws Tr064Error if the document is not well-formed
 */
export function parseSoapFault(xml: string): { errorCode?: number; errorDescription: string } | undefined {
  const body = child(child(parseXml(xml), 'Envelope'), 'Body');
  if (!isNode(body) || !('Fault' in body)) {
    return undefined;
  }

  const fault = body.Fault;
  const upnpError = child(child(fault, 'detail'), 'UPnPError');
  const code = toText(child(upnpError, 'errorCode'))?.trim();

  return {
    errorCode: code && /^\d+$/.test(code) ? parseInt(code, 10) : undefined,
    errorDescription:
      toText(child(upnpError, 'errorDescription')) ?? toText(child(fault, 'faultstring')) ?? 'Unknown SOAP fault',
  };
}

/**
 * Services of a device and of its embedded devices, depth first
 */
function collectDevice(device: unknown, description: DeviceDescription): void {
  if (description.modelName === undefined) {
    description.modelName = toText(child(device, 'modelName'));
  }

  for (const service of toArray(child(child(device, 'serviceList'), 'service'))) {
    const serviceType = toText(child(service, 'serviceType'));
    const controlURL = toText(child(service, 'controlURL'));
    if (serviceType && controlURL) {
      description.services.push({ serviceType, controlURL });
    }
  }

  for (const embedded of toArray(child(child(device, 'deviceList'), 'device'))) {
    collectDevice(embedded, description);
  }
}

/**
 * Read model name and service list from a device description (tr64desc.xml, igddesc.xml)
 * @throws Tr064Error if the document is not well-formed
 */
export function parseDeviceDescription(xml: string): DeviceDescription {
  const services: ServiceDescription[] = [];
  const description: DeviceDescription = { modelName: undefined, services };

  for (const device of toArray(child(child(parseXml(xml), 'root'), 'device'))) {
    collectDevice(device, description);
  }

  return description;
}
