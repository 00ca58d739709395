/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Random well-formed XML with the expected tag records written alongside the text.
*/

import { ROOT_TAG, type TagBounds } from '../tags/types';
import type { SeededRandom } from './prng';

export interface GeneratedXml {
  text: string;
  /** Indexed by tag id, ids in open order. */
  records: TagBounds[];
}

const ELEMENT_NAMES = ['a', 'b', 'item', 'p', 'span'];
const WHITESPACE = ['', ' ', '  ', '\n', '\n  ', '\t'];
const WORDS = ['x', 'word', 'ab', 'lorem', 'z'];

export function generateXml(random: SeededRandom, maxDepth = 4): GeneratedXml {
  let text = '';
  const records: TagBounds[] = [];

  const element = (parent: number, depth: number): void => {
    const id = records.length;
    const name = random.pick(ELEMENT_NAMES);
    const openStart = text.length;

    if (depth > 0 && random.nextInt(5) === 0) {
      text += `<${name}/>`;
      records.push({ parent, openStart, openEnd: text.length, closeStart: text.length, closeEnd: text.length });
      return;
    }

    text += `<${name}>`;
    records.push({ parent, openStart, openEnd: text.length, closeStart: -1, closeEnd: -1 });

    const pieces = random.nextRange(0, 4);
    for (let i = 0; i < pieces; i++) {
      switch (random.nextInt(5)) {
        case 0:
          text += random.pick(WHITESPACE);
          break;
        case 1:
          text += random.pick(WORDS);
          break;
        case 2:
          text += '<!-- note -->';
          break;
        default:
          if (depth < maxDepth) element(id, depth + 1);
          else text += random.pick(WHITESPACE);
      }
    }

    const closeStart = text.length;
    text += `</${name}>`;
    records[id] = { ...records[id], closeStart, closeEnd: text.length };
  };

  element(ROOT_TAG, 0);
  return { text, records };
}

/** Innermost record whose [openStart, closeEnd) holds offset, by scanning all records. */
export function innermostTag(records: readonly TagBounds[], offset: number): number {
  let best = ROOT_TAG;
  records.forEach((r, id) => {
    if (offset >= r.openStart && offset < r.closeEnd) {
      if (best === ROOT_TAG || r.openStart >= records[best].openStart) best = id;
    }
  });
  return best;
}
