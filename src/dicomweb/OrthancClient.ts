/**
 * Orthanc native REST client. Orthanc lists studies by its own resource ids;
 * the Study Instance UID comes from each study's MainDicomTags.
 */

import { AxiosInstance } from 'axios';
import { z } from 'zod';
import { DicomWebError, errorMessage } from '../errors.js';
import { getLogger, registerComponent } from '../logging/index.js';
import type { StudySummary } from '../relay/types.js';
import { HttpClientOptions, createHttpClient, expectStatus, send } from './HttpClient.js';

registerComponent('orthanc', 'Orthanc REST client');
const logger = getLogger('orthanc');

const StudyIdsSchema = z.array(z.string());

const StudyDetailsSchema = z
  .object({
    ID: z.string().optional(),
    MainDicomTags: z.object({ StudyInstanceUID: z.string().min(1) }).passthrough(),
  })
  .passthrough();

export class OrthancClient {
  private readonly http: AxiosInstance;

  constructor(options: HttpClientOptions) {
    this.http = createHttpClient(options);
  }

  async listStudyIds(): Promise<string[]> {
    const response = await send<unknown>(this.http, { method: 'GET', url: '/studies' });
    expectStatus(response, 'GET /studies', 200);
    const parsed = StudyIdsSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new DicomWebError('GET /studies did not return an array of ids', response.status);
    }
    return parsed.data;
  }

  async getStudyInstanceUID(id: string): Promise<string> {
    const url = `/studies/${encodeURIComponent(id)}`;
    const response = await send<unknown>(this.http, { method: 'GET', url });
    expectStatus(response, `GET ${url}`, 200);
    const parsed = StudyDetailsSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new DicomWebError(`GET ${url} has no MainDicomTags.StudyInstanceUID`, response.status);
    }
    return parsed.data.MainDicomTags.StudyInstanceUID;
  }

  /**
   * Every study with its UID. A study whose details cannot be read is
   * skipped this time and picked up on a later poll.
   */
  async listStudies(): Promise<StudySummary[]> {
    const studies: StudySummary[] = [];
    for (const id of await this.listStudyIds()) {
      try {
        studies.push({ studyIdentifier: id, studyInstanceUID: await this.getStudyInstanceUID(id) });
      } catch (error) {
        logger.warn(`Skipping Orthanc study ${id}`, { error: errorMessage(error) });
      }
    }
    return studies;
  }
}
