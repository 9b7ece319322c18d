import http from 'node:http';
import https from 'node:https';
import { EnvoyConfig } from '../../config';
import {
  DeviceConnectionError,
  DeviceTimeoutError,
  DeviceTlsError,
  SamplerError,
  describeError,
} from '../../errors';
import { Clock, InverterSnapshot, PowerSnapshot, systemClock } from '../../types/sampling';
import { parseInverterSnapshot, parsePowerSnapshot } from './envoyPayload';

export interface DeviceClient {
  getPowerSnapshot(): Promise<PowerSnapshot>;
  getInverterSnapshot(): Promise<InverterSnapshot>;
}

const POWER_PATH = '/production.json?details=1';
const INVERTER_PATH = '/api/v1/production/inverters';

const timeoutCodes = new Set(['ETIMEDOUT', 'ESOCKETTIMEDOUT', 'UND_ERR_CONNECT_TIMEOUT']);
const tlsCodes = new Set([
  'EPROTO',
  'CERT_HAS_EXPIRED',
  'DEPTH_ZERO_SELF_SIGNED_CERT',
  'SELF_SIGNED_CERT_IN_CHAIN',
  'UNABLE_TO_VERIFY_LEAF_SIGNATURE',
  'UNABLE_TO_GET_ISSUER_CERT_LOCALLY',
]);

function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

export function toDeviceError(err: unknown, target: string): SamplerError {
  if (err instanceof SamplerError) return err;
  const code = errorCode(err) ?? '';
  const message = `${target}: ${describeError(err)}`;
  if (timeoutCodes.has(code)) return new DeviceTimeoutError(message, { cause: err });
  if (tlsCodes.has(code) || code.startsWith('ERR_SSL') || code.startsWith('ERR_TLS')) {
    return new DeviceTlsError(message, { cause: err });
  }
  return new DeviceConnectionError(message, { cause: err });
}

/**
 * Reads the gateway's local HTTPS API with a bearer token. Each request has
 * its own socket timeout.
 */
export class EnvoyClient implements DeviceClient {
  constructor(
    private readonly config: EnvoyConfig,
    private readonly clock: Clock = systemClock,
  ) {}

  async getPowerSnapshot(): Promise<PowerSnapshot> {
    const payload = await this.getJson(POWER_PATH);
    return parsePowerSnapshot(payload, this.clock.now());
  }

  async getInverterSnapshot(): Promise<InverterSnapshot> {
    return parseInverterSnapshot(await this.getJson(INVERTER_PATH));
  }

  private getJson(path: string): Promise<unknown> {
    const url = new URL(path, `${this.config.url}/`);
    const target = `GET ${url.pathname}`;
    const options: https.RequestOptions = {
      method: 'GET',
      headers: {
        Accept: 'application/json',
        Authorization: `Bearer ${this.config.token}`,
      },
      timeout: this.config.requestTimeoutMs,
      rejectUnauthorized: this.config.rejectUnauthorized,
    };

    return new Promise((resolve, reject) => {
      const onResponse = (res: http.IncomingMessage) => {
        const chunks: Buffer[] = [];
        res.on('data', (chunk: Buffer) => chunks.push(chunk));
        res.on('error', (err) => reject(toDeviceError(err, target)));
        res.on('end', () => {
          const status = res.statusCode ?? 0;
          if (status >= 400) {
            reject(new DeviceConnectionError(`${target}: gateway responded with HTTP ${status}`));
            return;
          }
          try {
            resolve(JSON.parse(Buffer.concat(chunks).toString('utf-8')));
          } catch (err) {
            reject(new DeviceConnectionError(`${target}: invalid JSON (${describeError(err)})`, { cause: err }));
          }
        });
      };

      const req =
        url.protocol === 'http:' ? http.request(url, options, onResponse) : https.request(url, options, onResponse);

      req.on('timeout', () => {
        req.destroy(new DeviceTimeoutError(`${target}: no response within ${this.config.requestTimeoutMs}ms`));
      });
      req.on('error', (err) => reject(toDeviceError(err, target)));
      req.end();
    });
  }
}
