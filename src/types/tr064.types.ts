/**
 * TR-064 transport types
 */

export type ResultValue = string | number;

/**
 * Named output arguments of one remote action
 */
export type QueryResult = Readonly<Record<string, ResultValue>>;

export type ActionArguments = Record<string, string | number>;

export interface ConnectOptions {
  address: string;
  port: number;
  user: string;
  password: string;
  timeout?: number;
}

/**
 * An open connection to the router's management interface
 */
export interface RouterConnection {
  /** Model name from the device description, e.g. "FRITZ!Box 7590" */
  readonly modelName: string;
  call(service: string, action: string, args?: ActionArguments): Promise<QueryResult>;
  close(): Promise<void>;
}

export type ConnectFunction = (options: ConnectOptions) => Promise<RouterConnection>;

/**
 * Entry of a device description's service list
 */
export interface ServiceDescription {
  serviceType: string;
  controlURL: string;
}

export interface DeviceDescription {
  modelName?: string;
  services: ServiceDescription[];
}
