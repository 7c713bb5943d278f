#!/usr/bin/env node
/*
  Copyright © 2018-2022 Kerry Shetline, kerry@shetline.com

  MIT license: https://opensource.org/licenses/MIT

  Permission is hereby granted, free of charge, to any person obtaining a copy of this software and associated
  documentation files (the "Software"), to deal in the Software without restriction, including without limitation the
  rights to use, copy, modify, merge, publish, distribute, sublicense, and/or sell copies of the Software, and to permit
  persons to whom the Software is furnished to do so, subject to the following conditions:

  The above copyright notice and this permission notice shall be included in all copies or substantial portions of the
  Software.

  THE SOFTWARE IS PROVIDED "AS IS", WITHOUT WARRANTY OF ANY KIND, EXPRESS OR IMPLIED, INCLUDING BUT NOT LIMITED TO THE
  WARRANTIES OF MERCHANTABILITY, FITNESS FOR A PARTICULAR PURPOSE AND NONINFRINGEMENT. IN NO EVENT SHALL THE AUTHORS OR
  COPYRIGHT HOLDERS BE LIABLE FOR ANY CLAIM, DAMAGES OR OTHER LIABILITY, WHETHER IN AN ACTION OF CONTRACT, TORT OR
  OTHERWISE, ARISING FROM, OUT OF OR IN CONNECTION WITH THE SOFTWARE OR THE USE OR OTHER DEALINGS IN THE SOFTWARE.
*/

import { loadConfig } from './config';
import { NtpClient } from './ntp-client';
import { SntpServer } from './sntp-server';
import { filterError, timeStamp, unref } from './util';

process.on('unhandledRejection', err => console.error(`${timeStamp()} -- Unhandled rejection:`, err));

async function query(target: string): Promise<void> {
  const client = new NtpClient(target);

  try {
    const result = await client.query();

    console.log('server:     %s (%s)', result.address, result.refId);
    console.log('stratum:    %d', result.packet.stratum);
    console.log('time:       %s', new Date(result.txTm).toISOString());
    console.log('offset:     %s ms', result.offset.toFixed(3));
    console.log('delay:      %s ms', result.roundTripDelay.toFixed(3));
  }
  finally {
    client.close();
  }
}

async function serve(): Promise<void> {
  const config = loadConfig();
  const server = new SntpServer(config.server);
  const controller = new AbortController();
  const bind = `${config.host}:${config.port}`;

  function shutdown(signal: string): void {
    console.log(`\n*** ${signal}: closing server at ${timeStamp()} ***`);
    // Make sure that if the orderly clean-up gets stuck, shutdown still happens.
    unref(setTimeout(() => process.exit(0), 5000));
    controller.abort();
  }

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  console.log(`*** Starting SNTP server on ${bind} at ${timeStamp()} ***`);

  try {
    await server.serve(config.host, config.port, controller.signal);
  }
  catch (err) {
    const code = err instanceof Error && 'code' in err ? err.code : undefined;

    // Friendlier messages for the usual bind failures
    if (code === 'EACCES')
      throw new Error(`${bind} requires elevated privileges`);
    else if (code === 'EADDRINUSE')
      throw new Error(`${bind} is already in use`);

    throw err;
  }
}

const queryIndex = process.argv.indexOf('--query');
const main = queryIndex >= 0 ? query(process.argv[queryIndex + 1] || 'localhost') : serve();

main.then(() => process.exit(0)).catch(err => {
  console.error('%s -- %s', timeStamp(), filterError(err));
  process.exit(1);
});
