import { ModelDetector } from './detect.js';
import { renderToBuffer, type RenderOptions } from './job.js';
import { NetworkTransport, RAW_PRINT_PORT, type Transport } from './network.js';
import type { ImageSource } from './raster.js';
import { debugLog, infoLog } from './utils.js';

export type PrintOptions = RenderOptions & {
  port?: number;
};

export type PrinterClientOptions = {
  detector?: ModelDetector;
  transport?: Transport;
};

export class PrinterClient {
  private detector: ModelDetector;
  private transport: Transport;
  constructor({
    detector = new ModelDetector(),
    transport = new NetworkTransport(),
  }: PrinterClientOptions = {}) {
    this.detector = detector;
    this.transport = transport;
  }
  /**
   * The model to render for: an explicit model wins, otherwise the printer
   * at `host` is asked. Without either the default geometry applies.
   */
  resolveModel = async (
    host?: string,
    model?: string | null
  ): Promise<string | null> => {
    if (model) return model;
    if (!host) return null;

    return this.detector.detect(host);
  };
  render = async (
    images: Iterable<ImageSource>,
    { host, ...options }: RenderOptions & { host?: string } = {}
  ) => {
    const model = await this.resolveModel(host, options.model);
    debugLog('Rendering for model:', model);

    return renderToBuffer(images, { ...options, model });
  };
  print = async (
    host: string,
    images: Iterable<ImageSource>,
    { port = RAW_PRINT_PORT, ...options }: PrintOptions = {}
  ) => {
    const data = await this.render(images, { ...options, host });

    infoLog(`Sending ${data.length} bytes to ${host}:${port}`);
    await this.transport.open(host, port);
    try {
      await this.transport.write(data);
    } finally {
      this.transport.close();
    }

    return data.length;
  };
}
