import { PrinterModel } from './profile.js';
import { debugLog, warnLog } from './utils.js';

// The one admin page both supported printers serve
const DETECT_PATH = '/admin/default.html';
const HTTP_UNAUTHORIZED = 401;

export const DETECT_TIMEOUT = 5_000;

const TITLE_MARKERS: [string, PrinterModel][] = [
  ['<TITLE>Brother PT-9800PCN</TITLE>', PrinterModel.PT9800PCN],
  ['<title>Brother PT-P950NW</title>', PrinterModel.P950NW],
];

export type DetectionResult = PrinterModel | 'unknown' | 'error';

export type DetectorOptions = {
  fetch?: typeof fetch;
  cache?: Map<string, PrinterModel>;
  timeout?: number;
};

export class ModelDetector {
  private fetchImpl: typeof fetch;
  private timeout: number;
  // Entries are never invalidated; a printer keeps its model
  readonly cache: Map<string, PrinterModel>;
  constructor({
    fetch: fetchImpl = globalThis.fetch,
    cache = new Map(),
    timeout = DETECT_TIMEOUT,
  }: DetectorOptions = {}) {
    this.fetchImpl = fetchImpl;
    this.cache = cache;
    this.timeout = timeout;
  }
  detect = async (host: string): Promise<DetectionResult> => {
    const cached = this.cache.get(host);
    if (cached) return cached;

    let html: string;
    try {
      html = await this.fetchAdminPage(host);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      warnLog(`Failed to detect printer at ${host}: ${message}`);
      return 'error';
    }

    const match = TITLE_MARKERS.find(([marker]) => html.includes(marker));
    if (!match) {
      debugLog(`No known printer model at ${host}`);
      return 'unknown';
    }

    const [, model] = match;
    debugLog(`Detected ${model} at ${host}`);
    this.cache.set(host, model);

    return model;
  };
  private fetchAdminPage = async (host: string) => {
    const fetchImpl = this.fetchImpl;
    const response = await fetchImpl(`http://${host}${DETECT_PATH}`, {
      signal: AbortSignal.timeout(this.timeout),
    });

    // The admin page asks for a login but still carries the title
    if (!response.ok && response.status !== HTTP_UNAUTHORIZED) {
      throw new Error(`HTTP ${response.status} ${response.statusText}`);
    }

    return response.text();
  };
}
