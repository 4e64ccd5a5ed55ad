#!/usr/bin/env node

import { InvalidArgumentError, Option, program } from 'commander';
import { existsSync } from 'node:fs';
import { writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import assert from 'node:assert';
import loglevel from 'loglevel';

import { CompressionMode } from './lib/frame.js';
import { loadImage, type RasterImage } from './lib/image.js';
import { DEFAULT_MARGIN } from './lib/job.js';
import { PrinterModel } from './lib/profile.js';
import { PrinterClient } from './lib/printer.js';
import { errorLog, infoLog } from './lib/utils.js';

type CliOptions = {
  host?: string;
  model?: PrinterModel;
  topMargin: number;
  bottomMargin: number;
  compression: 'simple' | 'tiff';
  output?: string;
  debug?: boolean;
};

function parseMargin(value: string) {
  const margin = Number(value);
  if (!Number.isInteger(margin) || margin < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }

  return margin;
}

program
  .name('ptraster')
  .description('Print images on Brother PT label printers over the network')
  .argument('<images...>', 'paths of the images to print, one label each')
  .option('-H, --host <host>', 'address of the printer')
  .addOption(
    new Option('-m, --model <model>', 'printer model (detected when omitted)')
      .choices(Object.values(PrinterModel))
  )
  .option(
    '-t, --top-margin <rows>',
    'blank rows before each image',
    parseMargin,
    DEFAULT_MARGIN
  )
  .option(
    '-b, --bottom-margin <rows>',
    'blank rows after each image',
    parseMargin,
    DEFAULT_MARGIN
  )
  .addOption(
    new Option('-c, --compression <mode>', 'row compression')
      .choices(['simple', 'tiff'])
      .default('simple')
  )
  .option('-o, --output <file>', 'write the job to a file instead of printing')
  .option('--debug', 'enable debug logging')
  .action(async (args: string[], options: CliOptions) => {
    const { host, model, topMargin, bottomMargin, compression, output, debug } =
      options;

    loglevel.setDefaultLevel(debug ? 'DEBUG' : 'INFO');

    try {
      assert(host || output, 'Either --host or --output is required');

      const images: RasterImage[] = [];
      for (const arg of args) {
        const imagePath = resolve(process.cwd(), arg);
        assert(existsSync(imagePath), `File does not exist: ${imagePath}`);
        images.push(await loadImage(imagePath));
      }

      const renderOptions = {
        model,
        topMargin,
        bottomMargin,
        compression:
          compression === 'tiff' ? CompressionMode.TIFF : CompressionMode.SIMPLE,
      };
      const client = new PrinterClient();

      if (output) {
        const data = await client.render(images, { ...renderOptions, host });
        await writeFile(output, data);
        infoLog(`Wrote ${data.length} bytes to ${output}`);
      } else if (host) {
        await client.print(host, images, renderOptions);
        infoLog('Print job sent!');
      }
    } catch (error) {
      errorLog(error instanceof Error ? error.message : error);
      process.exitCode = 1;
    }
  });

await program.parseAsync();
