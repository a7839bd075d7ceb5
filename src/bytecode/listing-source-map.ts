// Source map from disassembly listing lines back to the lowered source

import { SourceMapGenerator } from 'source-map';
import { BytecodeArray } from './bytecode-array';
import { disassemble } from './disassembler';

export interface ListingWithSourceMap {
  listing: string;
  sourceMap: string;
}

/**
 * Disassemble `bytecode` and map each instruction line that carries a
 * source position to `sourceFile`.
 */
export function generateListingWithSourceMap(
  bytecode: BytecodeArray,
  listingFile: string,
  sourceFile: string
): ListingWithSourceMap {
  const generator = new SourceMapGenerator({ file: listingFile });
  const lines = disassemble(bytecode);

  lines.forEach((line, i) => {
    if (line.instructionIndex === undefined) {
      return;
    }
    const position = bytecode.sourcePositionAt(line.instructionIndex);
    if (!position) {
      return;
    }
    generator.addMapping({
      generated: { line: i + 1, column: 0 },
      source: sourceFile,
      original: { line: position.line, column: position.column }
    });
  });

  return {
    listing: lines.map(line => line.text).join('\n'),
    sourceMap: generator.toString()
  };
}
