/**
 * DICOMweb client: QIDO-RS study listing, WADO-RS study retrieval and
 * STOW-RS store.
 */

import { AxiosInstance } from 'axios';
import { z } from 'zod';
import { DicomWebError } from '../errors.js';
import { getLogger, registerComponent } from '../logging/index.js';
import type { StudySummary } from '../relay/types.js';
import { HttpClientOptions, createHttpClient, expectStatus, headerValue, send } from './HttpClient.js';

registerComponent('dicomweb', 'DICOMweb (QIDO/WADO/STOW) client');
const logger = getLogger('dicomweb');

export const WADO_ACCEPT = 'multipart/related; type="application/dicom"';

/** (0020,000D) Study Instance UID in the DICOM JSON model */
const STUDY_UID_KEY = '0020000D';

/**
 * DICOM JSON model entry; only the Study Instance UID is read
 */
const QidoStudySchema = z
  .object({
    [STUDY_UID_KEY]: z.object({ Value: z.array(z.unknown()).optional() }).passthrough().optional(),
  })
  .passthrough();

const QidoResponseSchema = z.array(QidoStudySchema);

export interface RetrievedMultipart {
  body: Buffer;
  contentType: string;
}

export interface StowResponse {
  statusCode: number;
}

export class DicomWebClient {
  private readonly http: AxiosInstance;

  constructor(private readonly options: HttpClientOptions) {
    this.http = createHttpClient(options);
  }

  get baseUrl(): string {
    return this.options.baseUrl;
  }

  /**
   * QIDO-RS GET /studies
   */
  async listStudies(): Promise<StudySummary[]> {
    const response = await send<unknown>(this.http, {
      method: 'GET',
      url: '/studies',
      headers: { Accept: 'application/dicom+json' },
    });
    // 204: no matching studies
    if (response.status === 204) {
      return [];
    }
    expectStatus(response, 'GET /studies', 200);

    const parsed = QidoResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new DicomWebError('GET /studies did not return a DICOM JSON array', response.status);
    }

    const studies: StudySummary[] = [];
    for (const entry of parsed.data) {
      const uid = entry[STUDY_UID_KEY]?.Value?.[0];
      if (typeof uid !== 'string' || uid === '') {
        logger.debug('Skipping QIDO entry without a Study Instance UID');
        continue;
      }
      studies.push({ studyIdentifier: uid, studyInstanceUID: uid });
    }
    return studies;
  }

  /**
   * WADO-RS GET /studies/{uid} as one multipart body
   */
  async retrieveStudy(studyInstanceUID: string): Promise<RetrievedMultipart> {
    const url = `/studies/${encodeURIComponent(studyInstanceUID)}`;
    const response = await send<ArrayBuffer>(this.http, {
      method: 'GET',
      url,
      headers: { Accept: WADO_ACCEPT },
      responseType: 'arraybuffer',
    });
    expectStatus(response, `GET ${url}`, 200);

    const body = Buffer.from(response.data);
    logger.debug(`Retrieved ${body.length} bytes for study ${studyInstanceUID}`);
    return { body, contentType: headerValue(response.headers['content-type']) ?? '' };
  }

  /**
   * STOW-RS POST /studies. The status is returned, not judged: 200 means
   * every instance was stored, 202 that some were not.
   */
  async storeInstances(body: Buffer, contentType: string): Promise<StowResponse> {
    const response = await send<unknown>(this.http, {
      method: 'POST',
      url: '/studies',
      headers: { 'Content-Type': contentType, Accept: 'application/dicom+json' },
      data: body,
    });
    return { statusCode: response.status };
  }
}
