import type { AxiosInstance } from 'axios';
import { createLogger } from '../core/Logger';
import { createHttpClient, formatHttpError } from '../utils/http';
import type {
  ActionArguments,
  ConnectOptions,
  DeviceDescription,
  QueryResult,
  RouterConnection,
  ServiceDescription,
} from '../types/tr064.types';
import {
  Tr064Error,
  buildEnvelope,
  parseActionResponse,
  parseDeviceDescription,
  parseSoapFault,
  serviceName,
} from './soap';

const logger = createLogger('FritzConnection');

export const TR064_DESCRIPTION = '/tr64desc.xml';
export const IGD_DESCRIPTION = '/igddesc.xml';

// UPnP "Invalid Action": the service exists under this name but lacks the action
const INVALID_ACTION = 401;

/**
 * Connection to a FRITZ!Box TR-064 interface.
 *
 * Services are discovered from the TR-064 and IGD (UPnP) device descriptions
 * and addressed by short name, e.g. `call('WANIPConnection', 'GetStatusInfo')`.
 * When both descriptions list a service, the TR-064 entry is tried first and
 * the IGD entry answers actions the TR-064 one does not know.
 */
export class FritzConnection implements RouterConnection {
  readonly modelName: string;
  private client: AxiosInstance;
  private services: Map<string, ServiceDescription[]> | null;
  // Entry that answered an action, keyed by "<service>#<action>"
  private routes = new Map<string, ServiceDescription>();

  constructor(client: AxiosInstance, modelName: string, services: Map<string, ServiceDescription[]>) {
    this.client = client;
    this.modelName = modelName;
    this.services = services;
  }

  /**
   * Open a connection: load the device descriptions and index their services
   * @throws Tr064Error if no device description could be loaded
   */
  static async connect(options: ConnectOptions): Promise<FritzConnection> {
    const host = options.address.includes(':') ? `[${options.address}]` : options.address;
    const client = createHttpClient({
      baseURL: `http://${host}:${options.port}`,
      timeout: options.timeout,
      auth: { username: options.user, password: options.password },
    });

    // TR-064 first: its entries and model name take precedence
    const descriptions: DeviceDescription[] = [];
    for (const path of [TR064_DESCRIPTION, IGD_DESCRIPTION]) {
      try {
        const response = await client.get<string>(path, { responseType: 'text' });
        descriptions.push(parseDeviceDescription(response.data));
      } catch (error) {
        const message = error instanceof Tr064Error ? error.message : formatHttpError(error);
        logger.debug(`Could not load ${path}: ${message}`);
      }
    }

    if (descriptions.length === 0) {
      throw new Tr064Error(`No device description found at ${options.address}:${options.port}`);
    }

    const services = new Map<string, ServiceDescription[]>();
    for (const description of descriptions) {
      for (const service of description.services) {
        const name = serviceName(service.serviceType);
        services.set(name, [...(services.get(name) ?? []), service]);
      }
    }

    const modelName = descriptions.find((d) => d.modelName)?.modelName ?? options.address;

    logger.info(`Connected to ${modelName} at ${options.address}:${options.port} (${services.size} services)`);
    return new FritzConnection(client, modelName, services);
  }

  /**
   * Names of all discovered services
   */
  getServiceNames(): string[] {
    return this.services ? [...this.services.keys()] : [];
  }

  /**
   * Invoke an action and return its output arguments
   * @throws Tr064Error on unknown service, SOAP fault or transport failure
   */
  async call(service: string, action: string, args: ActionArguments = {}): Promise<QueryResult> {
    const routeKey = `${serviceName(service)}#${action}`;
    const known = this.routes.get(routeKey);
    const candidates = known ? [known] : this.resolveService(service);

    for (const [index, description] of candidates.entries()) {
      try {
        const result = await this.invoke(description, action, args);
        this.routes.set(routeKey, description);
        return result;
      } catch (error) {
        const next = candidates[index + 1];
        if (!next || !(error instanceof Tr064Error) || error.errorCode !== INVALID_ACTION) {
          throw error;
        }
        logger.debug(`${description.controlURL} rejected ${action}, trying ${next.controlURL}`);
      }
    }

    throw new Tr064Error(`Unknown service: ${service}`);
  }

  async close(): Promise<void> {
    this.services = null;
    this.routes.clear();
    logger.debug(`Closed connection to ${this.modelName}`);
  }

  private async invoke(
    description: ServiceDescription,
    action: string,
    args: ActionArguments
  ): Promise<QueryResult> {
    let status: number;
    let body: string;
    try {
      const response = await this.client.post<string>(
        description.controlURL,
        buildEnvelope(description.serviceType, action, args),
        {
          headers: {
            'Content-Type': 'text/xml; charset="utf-8"',
            SOAPACTION: `"${description.serviceType}#${action}"`,
          },
          responseType: 'text',
          // A SOAP fault arrives as HTTP 500 with a readable body
          validateStatus: (code) => (code >= 200 && code < 300) || code === 500,
        }
      );
      status = response.status;
      body = response.data;
    } catch (error) {
      throw new Tr064Error(formatHttpError(error), undefined, { cause: error });
    }

    if (status === 500) {
      let fault: ReturnType<typeof parseSoapFault> = undefined;
      try {
        fault = parseSoapFault(body);
      } catch (error) {
        const message = error instanceof Error ? error.message : 'Unknown error';
        logger.debug(`Unreadable error body from ${description.controlURL}: ${message}`);
      }
      const code = fault?.errorCode !== undefined ? ` (UPnP error ${fault.errorCode})` : '';
      throw new Tr064Error(
        `${fault?.errorDescription ?? 'HTTP 500 without SOAP fault'}${code}`,
        fault?.errorCode
      );
    }

    return parseActionResponse(body, action);
  }

  private resolveService(service: string): ServiceDescription[] {
    if (!this.services) {
      throw new Tr064Error('Connection is closed');
    }

    const descriptions = this.services.get(serviceName(service));
    if (!descriptions) {
      throw new Tr064Error(`Unknown service: ${service}`);
    }
    return descriptions;
  }
}
