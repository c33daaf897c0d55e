import type { MetricQuery } from '../../types/fritzbox.types';
import type { QueryResult, ResultValue } from '../../types/tr064.types';

/**
 * 1 when the field reads `expected`, 0 otherwise
 */
export function statusGauge(expected: string): (value: ResultValue) => number {
  return (value) => (value === expected ? 1 : 0);
}

/**
 * Actions polled every cycle, in dispatch order
 */
export const METRIC_CATALOG = [
  {
    service: 'WANIPConnection',
    action: 'GetStatusInfo',
    fields: [
      { source: 'NewConnectionStatus', type: 'gauge', typeInstance: 'constatus', convert: statusGauge('Connected') },
      { source: 'NewUptime', type: 'uptime', typeInstance: '' },
    ],
  },
  {
    service: 'WANCommonInterfaceConfig',
    action: 'GetCommonLinkProperties',
    fields: [
      { source: 'NewLayer1DownstreamMaxBitRate', type: 'bitrate', typeInstance: 'downstream' },
      { source: 'NewLayer1UpstreamMaxBitRate', type: 'bitrate', typeInstance: 'upstream' },
      { source: 'NewPhysicalLinkStatus', type: 'gauge', typeInstance: 'dslstatus', convert: statusGauge('Up') },
    ],
  },
  {
    service: 'WANCommonInterfaceConfig',
    action: 'GetAddonInfos',
    fields: [
      { source: 'NewByteSendRate', type: 'if_octets', typeInstance: 'tx' },
      { source: 'NewByteReceiveRate', type: 'if_octets', typeInstance: 'rx' },
      { source: 'NewTotalBytesSent', type: 'bytes', typeInstance: 'wan_tx' },
      { source: 'NewTotalBytesReceived', type: 'bytes', typeInstance: 'wan_rx' },
    ],
  },
  {
    service: 'LANEthernetInterfaceConfig',
    action: 'GetStatistics',
    fields: [
      { source: 'NewBytesSent', type: 'bytes', typeInstance: 'lan_tx' },
      { source: 'NewBytesReceived', type: 'bytes', typeInstance: 'lan_rx' },
    ],
  },
] as const satisfies readonly MetricQuery[];

/**
 * Look a field up in a result; a miss is `undefined`, never an exception
 */
export function lookupField(result: QueryResult, source: string): ResultValue | undefined {
  return Object.prototype.hasOwnProperty.call(result, source) ? result[source] : undefined;
}
