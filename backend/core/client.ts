import fetch from 'node-fetch';
import { ListingError, LockedDetailError, TransportError } from './errors.js';
import type { Logger } from './log.js';
import type { Credentials, ExportConfig, RawEventDetail, RawEventListing } from './types.js';

export type ClientOptions = Pick<ExportConfig, 'baseUrl' | 'csrfHeader' | 'timeoutMs' | 'pageLimit' | 'probe'> & {
  log?: Logger;
};

type Method = 'GET' | 'POST' | 'PUT';

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function isDetail(v: unknown): v is RawEventDetail {
  return isRecord(v);
}

function isPublishedRow(v: unknown): v is RawEventListing {
  return isRecord(v)
    && (typeof v.id === 'string' || typeof v.id === 'number')
    && v.published === true;
}

/**
 * Authenticated access to the CMS admin API. Credentials are fixed for the
 * lifetime of the instance.
 */
export class BackendClient {
  private readonly credentials: Credentials;
  private readonly options: ClientOptions;

  constructor(credentials: Credentials, options: ClientOptions) {
    this.credentials = credentials;
    this.options = { ...options, baseUrl: options.baseUrl.replace(/\/+$/, '') };
  }

  private log(level: 'debug' | 'info' | 'warn', msg: string, id?: string) {
    this.options.log?.({ level, module: 'client', msg, ...(id ? { id } : {}) });
  }

  private headers(): Record<string, string> {
    return {
      Cookie: this.credentials.cookie,
      Referer: `${this.options.baseUrl}/admin/`,
      [this.options.csrfHeader]: this.credentials.token,
      'X-Requested-With': 'XMLHttpRequest',
      Accept: 'application/json'
    };
  }

  private async request(method: Method, path: string, form?: URLSearchParams): Promise<unknown> {
    const url = `${this.options.baseUrl}${path}`;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.options.timeoutMs);
    const started = Date.now();
    try {
      const res = await fetch(url, {
        method,
        headers: this.headers(),
        body: form,
        signal: controller.signal
      });
      if (!res.ok) {
        throw new TransportError(url, `HTTP ${res.status}: ${method} ${path}`);
      }
      const text = await res.text();
      this.log('debug', `${method} ${path} ${res.status} (${Date.now() - started} ms)`);
      try {
        return JSON.parse(text);
      } catch (e) {
        throw new TransportError(url, `Antwort ist kein JSON: ${method} ${path}`, { cause: e });
      }
    } catch (e) {
      if (e instanceof TransportError) throw e;
      const reason = controller.signal.aborted ? `Timeout nach ${this.options.timeoutMs} ms` : String(e);
      throw new TransportError(url, `${method} ${path}: ${reason}`, { cause: e });
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /** Releases the edit lock of an element. */
  async unlock(id: string, type: 'document' | 'object'): Promise<boolean> {
    const body = await this.request('PUT', '/admin/element/unlock-element', new URLSearchParams({ id, type }));
    return isRecord(body) && Boolean(body.success);
  }

  /**
   * Pre-flight check: unlocks a known element, which only succeeds with a
   * valid session and token. Never throws.
   */
  async probe(): Promise<boolean> {
    const { id, type } = this.options.probe;
    try {
      return await this.unlock(id, type);
    } catch (e) {
      this.log('warn', `Verbindungstest: ${e instanceof Error ? e.message : String(e)}`);
      return false;
    }
  }

  /** One page of the grid listing, reduced to published rows. */
  async listEvents(folderId: string, classId: string, page = { start: 0, limit: this.options.pageLimit }): Promise<RawEventListing[]> {
    const query = new URLSearchParams({ xaction: 'read', classId, folderId, _dc: String(Date.now()) });
    const form = new URLSearchParams({
      'fields[]': 'id',
      query: '',
      page: String(Math.floor(page.start / page.limit) + 1),
      start: String(page.start),
      limit: String(page.limit)
    });
    const body = await this.request('POST', `/admin/object/grid-proxy?${query}`, form);
    if (!isRecord(body) || body.success === false || !Array.isArray(body.data)) {
      throw new ListingError(`Listenabfrage für Klasse ${classId} lieferte keine Daten`);
    }
    const rows = body.data.filter(isPublishedRow);
    this.log('debug', `Klasse ${classId}: ${rows.length}/${body.data.length} veröffentlicht`);
    return rows;
  }

  /**
   * All published objects of a class. The backend has no "fetch all", so
   * this asks for a single page larger than any realistic result.
   */
  async listAll(folderId: string, classId: string): Promise<RawEventListing[]> {
    return this.listEvents(folderId, classId, { start: 0, limit: this.options.pageLimit });
  }

  /**
   * Object detail. An edit lock held by another session is released once
   * and the read retried; a second lock is a LockedDetailError.
   * Resolves undefined when the response carries no data object.
   */
  async fetchEventDetail(id: string, opts: { skipUnlock?: boolean } = {}): Promise<RawEventDetail | undefined> {
    const query = new URLSearchParams({ _dc: String(Date.now()), id });
    const body = await this.request('GET', `/admin/object/get?${query}`);
    if (!isRecord(body)) return undefined;

    if (body.editlock !== undefined && body.editlock !== null) {
      if (opts.skipUnlock) {
        throw new LockedDetailError(`Objekt ${id} ist nach dem Entsperren weiterhin gesperrt`);
      }
      this.log('info', 'Objekt gesperrt, entsperre', id);
      if (!(await this.unlock(id, 'object'))) {
        throw new LockedDetailError(`Objekt ${id} konnte nicht entsperrt werden`);
      }
      return this.fetchEventDetail(id, { skipUnlock: true });
    }

    return isDetail(body.data) ? body.data : undefined;
  }
}
