// Host-provided globals for running programs from the command line

import { VMValue, createObject, nativeFunction, toDisplayString } from '../runtime/values';

export type OutputWriter = (line: string) => void;

/**
 * Build the global slot array for `names`. Known host names get a value;
 * the rest read as undefined.
 */
export function createHostGlobals(names: readonly string[], write: OutputWriter): VMValue[] {
  const host = new Map<string, VMValue>([
    ['print', nativeFunction('print', (_receiver, args) => {
      write(args.map(toDisplayString).join(' '));
      return undefined;
    })],
    ['Object', nativeFunction('Object', () => createObject())]
  ]);
  return names.map(name => host.get(name));
}
