/**
 * SMS channel
 *
 * Sends through an Aliyun-style SMS RPC endpoint: the message is delivered as
 * template parameters, signed with HMAC-SHA1 over the sorted query string.
 */

import crypto from 'crypto';
import axios from 'axios';
import { SmsChannelConfig } from '../../types';
import { NotificationError, NotificationErrorKind } from '../../utils/errors';
import { HttpClient } from '../../fetcher/status-fetcher';
import { ChannelSender, RenderedMessage } from './channel';

export const DEFAULT_SMS_ENDPOINT = 'https://dysmsapi.aliyuncs.com/';

const AUTH_CODES = new Set([
  'InvalidAccessKeyId.NotFound',
  'SignatureDoesNotMatch',
  'isv.SMS_SIGNATURE_ILLEGAL',
  'isv.SMS_TEMPLATE_ILLEGAL'
]);

const RECIPIENT_CODES = new Set([
  'isv.MOBILE_NUMBER_ILLEGAL',
  'isv.MOBILE_COUNT_OVER_LIMIT',
  'isv.BLACK_KEY_CONTROL_LIMIT'
]);

const UNAVAILABLE_CODES = new Set([
  'isv.BUSINESS_LIMIT_CONTROL',
  'isv.DAY_LIMIT_CONTROL',
  'isv.AMOUNT_NOT_ENOUGH',
  'isv.OUT_OF_SERVICE',
  'Throttling.User'
]);

export interface SmsChannelOptions {
  httpClient?: HttpClient;
  timeoutMs?: number;
  now?: () => Date;
  nonce?: () => string;
}

export class SmsChannelSender implements ChannelSender {
  readonly name = 'sms';
  private readonly config: SmsChannelConfig;
  private readonly http: HttpClient;
  private readonly timeoutMs: number;
  private readonly now: () => Date;
  private readonly nonce: () => string;

  constructor(config: SmsChannelConfig, options: SmsChannelOptions = {}) {
    this.config = config;
    this.http = options.httpClient || axios.create();
    this.timeoutMs = options.timeoutMs ?? 10000;
    this.now = options.now || (() => new Date());
    this.nonce = options.nonce || (() => crypto.randomUUID());
  }

  async send(recipient: string, message: RenderedMessage): Promise<void> {
    const endpoint = this.config.endpoint || DEFAULT_SMS_ENDPOINT;
    const params = this.buildParams(recipient, message);

    let response: { status: number; data: unknown };
    try {
      response = await this.http.request({
        url: endpoint,
        method: 'GET',
        params,
        timeout: this.timeoutMs,
        validateStatus: () => true
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new NotificationError(`SMS request failed: ${reason}`, NotificationErrorKind.CHANNEL_UNAVAILABLE, this.name, recipient);
    }

    const body: object = typeof response.data === 'object' && response.data !== null ? response.data : {};
    const code = 'Code' in body && typeof body.Code === 'string' ? body.Code : undefined;
    const providerMessage = 'Message' in body && typeof body.Message === 'string' ? body.Message : '';

    if (code === 'OK') {
      return;
    }

    const reason = code ? `${code}${providerMessage ? `: ${providerMessage}` : ''}` : `HTTP ${response.status}`;
    throw new NotificationError(`SMS provider rejected message (${reason})`, classifySmsCode(code), this.name, recipient, {
      code,
      httpStatus: response.status
    });
  }

  /**
   * Signed query parameters for one SendSms call
   */
  buildParams(recipient: string, message: RenderedMessage): Record<string, string> {
    const params: Record<string, string> = {
      AccessKeyId: this.config.accessKeyId,
      Action: 'SendSms',
      Format: 'JSON',
      PhoneNumbers: recipient,
      RegionId: 'cn-hangzhou',
      SignName: this.config.signName,
      SignatureMethod: 'HMAC-SHA1',
      SignatureNonce: this.nonce(),
      SignatureVersion: '1.0',
      TemplateCode: this.config.templateCode,
      TemplateParam: JSON.stringify(message.params),
      Timestamp: this.now().toISOString().replace(/\.\d{3}Z$/, 'Z'),
      Version: '2017-05-25'
    };

    return { ...params, Signature: signRequest(params, this.config.accessKeySecret) };
  }
}

export function percentEncode(value: string): string {
  return encodeURIComponent(value)
    .replace(/\+/g, '%20')
    .replace(/\*/g, '%2A')
    .replace(/%7E/g, '~')
    .replace(/[!'()]/g, c => `%${c.charCodeAt(0).toString(16).toUpperCase()}`);
}

export function signRequest(params: Record<string, string>, secret: string): string {
  const canonical = Object.keys(params)
    .sort()
    .map(key => `${percentEncode(key)}=${percentEncode(params[key])}`)
    .join('&');
  const stringToSign = `GET&${percentEncode('/')}&${percentEncode(canonical)}`;
  return crypto.createHmac('sha1', `${secret}&`).update(stringToSign).digest('base64');
}

function classifySmsCode(code: string | undefined): NotificationErrorKind {
  if (!code) {
    return NotificationErrorKind.CHANNEL_UNAVAILABLE;
  }
  if (AUTH_CODES.has(code)) {
    return NotificationErrorKind.AUTH_FAILURE;
  }
  if (RECIPIENT_CODES.has(code)) {
    return NotificationErrorKind.RECIPIENT_REJECTED;
  }
  if (UNAVAILABLE_CODES.has(code)) {
    return NotificationErrorKind.CHANNEL_UNAVAILABLE;
  }
  return NotificationErrorKind.UNKNOWN;
}
