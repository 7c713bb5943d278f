import { isString } from '@tubular/util';

export function timeStamp(): string {
  return '[' + new Date().toISOString() + ']';
}

export function unref<T>(timer: T): T {
  if (timer && typeof timer === 'object' && 'unref' in timer && typeof timer.unref === 'function')
    timer.unref();

  return timer;
}

export function filterError(error: unknown): string {
  const message = error instanceof Error ? error.message : isString(error) ? error : String(error);

  return message.replace(/^\s*Error:\s*/i, '');
}

export function splitIpAndPort(ipWithPossiblePort: string, defaultPort?: number): [string | undefined, number | undefined] {
  if (!ipWithPossiblePort)
    return [undefined, defaultPort];

  let $ = /^\[(.+)]:(\d+)$/.exec(ipWithPossiblePort); // IPv6 with port

  if ($)
    return [$[1], Number($[2])];

  $ = /^([^[:]+):(\d+)$/.exec(ipWithPossiblePort); // domain or IPv4 with port

  if ($)
    return [$[1], Number($[2])];

  $ = /^\[(.+)]$/.exec(ipWithPossiblePort); // bracketed IPv6 without port

  if ($)
    return [$[1], defaultPort];

  return [ipWithPossiblePort, defaultPort];
}
