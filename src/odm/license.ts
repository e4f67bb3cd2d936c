import axios from 'axios';
import { createHash, randomUUID } from 'crypto';
import { config } from '../core/config';
import { AppError, ERROR_CODES, toNetworkError } from '../core/errors';
import { readTextIfExists, writeText } from '../core/fs';
import { logger } from '../core/logger';
import { paths } from '../core/paths';
import type { License, Manifest } from './types';
import { childElements, parseXml, textOf } from './xml';

export const OMC_VERSION = '1.2.0';
export const OS_VERSION = '10.14.2';
const HASH_SECRET = 'ELOSNOC*AIDEM*EVIRDREVO';
const LICENSE_NS = 'http://license.overdrive.com/2008/03/License.xsd';

/**
 * Request signature expected by the license server: base64 SHA-1 of the
 * client id, console version, OS version and shared secret, joined with "|"
 * and encoded as UTF-16LE.
 */
export function generateHash(clientId: string): string {
  const raw = [clientId, OMC_VERSION, OS_VERSION, HASH_SECRET].join('|');
  return createHash('sha1').update(Buffer.from(raw, 'utf16le')).digest('base64');
}

/** Reads the persisted client id, creating one on first use. */
export async function loadClientId(clientIdPath: string): Promise<string> {
  const existing = (await readTextIfExists(clientIdPath))?.trim();
  if (existing) {
    logger.debug({ clientIdPath }, 'Using stored client id');
    return existing;
  }
  const clientId = randomUUID().toUpperCase();
  await writeText(clientIdPath, clientId);
  logger.debug({ clientIdPath }, 'Generated new client id');
  return clientId;
}

export async function acquireLicense(manifest: Manifest, clientId: string): Promise<string> {
  const params = {
    MediaID: manifest.mediaId,
    ClientID: clientId,
    OMC: OMC_VERSION,
    OS: OS_VERSION,
    Hash: generateHash(clientId),
  };
  logger.debug({ url: manifest.licenseAcquisitionUrl, mediaId: manifest.mediaId, clientId }, 'Acquiring license');

  try {
    const response = await axios.get<string>(manifest.licenseAcquisitionUrl, {
      params,
      headers: { 'User-Agent': config.USER_AGENT },
      responseType: 'text',
      timeout: config.HTTP_TIMEOUT_MS,
    });
    const body = typeof response.data === 'string' ? response.data : '';
    if (body.trim().length === 0) {
      throw new AppError(ERROR_CODES.ERR_NETWORK, `License server returned an empty license for "${manifest.title}"`, {
        status: response.status,
      });
    }
    return body;
  } catch (error) {
    logger.error({ url: manifest.licenseAcquisitionUrl, error: error instanceof Error ? error.message : String(error) }, 'License request failed');
    throw toNetworkError(error, `license for "${manifest.title}"`);
  }
}

/** ClientID the license was issued for, from its SignedInfo block. */
export function extractLicenseClientId(licenseXml: string): string {
  const root = parseXml(licenseXml, 'license');
  const signedInfo = root.getElementsByTagNameNS(LICENSE_NS, 'SignedInfo').item(0)
    ?? childElements(root, 'SignedInfo')[0];
  const clientIdEl = signedInfo
    ? signedInfo.getElementsByTagNameNS(LICENSE_NS, 'ClientID').item(0) ?? childElements(signedInfo, 'ClientID')[0]
    : undefined;
  const clientId = textOf(clientIdEl ?? undefined);
  if (!clientId) {
    throw new AppError(ERROR_CODES.ERR_PARSE, 'Failed to extract ClientID from license');
  }
  return clientId;
}

/**
 * Acquires a fresh license for the loan. Licenses are short-lived and are
 * only held in memory for the current run.
 */
export async function getLicense(
  manifest: Manifest,
  clientIdPath: string = paths.clientId(config.ODM_CLIENT_ID_PATH)
): Promise<License> {
  const clientId = await loadClientId(clientIdPath);
  const xml = await acquireLicense(manifest, clientId);
  const licensedClientId = extractLicenseClientId(xml);
  logger.debug({ clientId: licensedClientId }, 'License ready');
  return { xml, clientId: licensedClientId };
}
