/**
 * Parsed key information
 */
export interface ParsedKey {
  type: 'key' | 'unknown';
  key?: string;
  char?: string;
  ctrl: boolean;
  alt: boolean;
  shift: boolean;
  meta: boolean;
}

type ParseResult = { event: ParsedKey; consumed: number };

const NO_MODIFIERS = { ctrl: false, alt: false, shift: false, meta: false } as const;

// CSI / SS3 final bytes for cursor keys
const CURSOR_KEYS: Record<number, string> = {
  0x41: 'ArrowUp',
  0x42: 'ArrowDown',
  0x43: 'ArrowRight',
  0x44: 'ArrowLeft',
  0x45: 'Clear', // keypad 5 with num lock off
  0x46: 'End',
  0x48: 'Home',
};

// CSI <n> ~ sequences
const TILDE_KEYS: Record<string, string> = {
  '1': 'Home',
  '2': 'Insert',
  '3': 'Delete',
  '4': 'End',
  '5': 'PageUp',
  '6': 'PageDown',
  '7': 'Home',
  '8': 'End',
};

// CSI I / CSI O, sent while focus reporting is on
const FOCUS_KEYS: Record<number, string> = {
  0x49: 'FocusIn',
  0x4f: 'FocusOut',
};

// SS3 sequences: function keys and the application-mode keypad
const SS3_KEYS: Record<number, string> = {
  0x50: 'F1',
  0x51: 'F2',
  0x52: 'F3',
  0x53: 'F4',
  0x4d: 'NumpadEnter',
  0x70: 'Numpad0',
  0x71: 'Numpad1',
  0x72: 'Numpad2',
  0x73: 'Numpad3',
  0x74: 'Numpad4',
  0x75: 'Numpad5',
  0x76: 'Numpad6',
  0x77: 'Numpad7',
  0x78: 'Numpad8',
  0x79: 'Numpad9',
};

const CONTROL_KEYS: Record<number, string> = {
  0x00: 'Ctrl-Space',
  0x08: 'Backspace',
  0x09: 'Tab',
  0x0a: 'Enter',
  0x0d: 'Enter',
};

/**
 * Parser for terminal input sequences
 */
export class KeyParser {
  private buffer: Buffer = Buffer.alloc(0);

  /**
   * Parse incoming data into key events. Incomplete sequences stay buffered.
   */
  parse(data: Buffer): ParsedKey[] {
    this.buffer = Buffer.concat([this.buffer, data]);
    const events: ParsedKey[] = [];

    while (this.buffer.length > 0) {
      const result = this.parseOne();
      if (result) {
        events.push(result.event);
        this.buffer = this.buffer.subarray(result.consumed);
      } else {
        // Incomplete sequence, wait for more data
        break;
      }
    }

    return events;
  }

  /**
   * Whether bytes of an unfinished sequence are waiting for more input
   */
  hasPending(): boolean {
    return this.buffer.length > 0;
  }

  /**
   * Give up waiting: a lone ESC becomes the Escape key, any other
   * unfinished sequence is dropped as unknown.
   */
  flush(): ParsedKey[] {
    if (this.buffer.length === 0) return [];

    const lone = this.buffer.length === 1 && this.buffer[0] === 0x1b;
    this.clear();
    return [lone ? { type: 'key', key: 'Escape', ...NO_MODIFIERS } : { type: 'unknown', ...NO_MODIFIERS }];
  }

  clear(): void {
    this.buffer = Buffer.alloc(0);
  }

  private parseOne(): ParseResult | null {
    const first = this.buffer[0] ?? 0;

    if (first === 0x1b) {
      return this.parseEscape();
    }

    if (first < 32) {
      return this.parseControl(first);
    }

    if (first === 0x7f) {
      return { event: { type: 'key', key: 'Backspace', ...NO_MODIFIERS }, consumed: 1 };
    }

    // Regular character (including UTF-8)
    return this.parseChar(first);
  }

  private parseEscape(): ParseResult | null {
    const b = this.buffer;
    const second = b[1];

    // Bare ESC may be the start of a sequence split across reads; flush() decides
    if (second === undefined) return null;

    // ESC [ (CSI sequence)
    if (second === 0x5b) {
      return this.parseCSI();
    }

    // ESC O (SS3 sequence)
    if (second === 0x4f) {
      return this.parseSS3();
    }

    // Alt + key
    if (second >= 32 && second < 127) {
      const char = String.fromCharCode(second);
      return {
        event: {
          type: 'key',
          key: char,
          char,
          ...NO_MODIFIERS,
          alt: true,
          shift: char !== char.toLowerCase(),
        },
        consumed: 2,
      };
    }

    return { event: { type: 'unknown', ...NO_MODIFIERS }, consumed: 2 };
  }

  private parseCSI(): ParseResult | null {
    const b = this.buffer;

    // Find end of CSI sequence (final byte in range 0x40-0x7E)
    let end = 2;
    let finalByte: number | undefined;
    while (end < b.length) {
      const byte = b[end];
      if (byte !== undefined && byte >= 0x40 && byte <= 0x7e) {
        finalByte = byte;
        break;
      }
      end++;
    }

    if (finalByte === undefined) return null; // Incomplete

    const params = b.subarray(2, end).toString();
    const consumed = end + 1;

    const cursorKey = CURSOR_KEYS[finalByte];
    if (cursorKey) {
      return { event: { type: 'key', key: cursorKey, ...this.parseModifiers(params) }, consumed };
    }

    const focusKey = FOCUS_KEYS[finalByte];
    if (focusKey && params === '') {
      return { event: { type: 'key', key: focusKey, ...NO_MODIFIERS }, consumed };
    }

    if (finalByte === 0x7e) {
      const [code = '', modifier] = params.split(';');
      const key = TILDE_KEYS[code];
      if (key) {
        return {
          event: { type: 'key', key, ...this.parseModifiers(modifier === undefined ? '' : `1;${modifier}`) },
          consumed,
        };
      }
    }

    return { event: { type: 'unknown', ...NO_MODIFIERS }, consumed };
  }

  private parseSS3(): ParseResult | null {
    const third = this.buffer[2];
    if (third === undefined) return null;

    const key = SS3_KEYS[third] ?? CURSOR_KEYS[third];
    if (key) {
      return { event: { type: 'key', key, ...NO_MODIFIERS }, consumed: 3 };
    }

    return { event: { type: 'unknown', ...NO_MODIFIERS }, consumed: 3 };
  }

  private parseControl(byte: number): ParseResult {
    const key = CONTROL_KEYS[byte] ?? `Ctrl-${String.fromCharCode(byte + 64)}`;
    const isCtrl = byte !== 0x09 && byte !== 0x0a && byte !== 0x0d && byte !== 0x08;

    return {
      event: { type: 'key', key, ...NO_MODIFIERS, ctrl: isCtrl },
      consumed: 1,
    };
  }

  private parseChar(first: number): ParseResult | null {
    let charLen = 1;

    // Determine UTF-8 character length
    if ((first & 0xe0) === 0xc0) charLen = 2;
    else if ((first & 0xf0) === 0xe0) charLen = 3;
    else if ((first & 0xf8) === 0xf0) charLen = 4;

    if (this.buffer.length < charLen) return null;

    const char = this.buffer.subarray(0, charLen).toString('utf8');

    return {
      event: {
        type: 'key',
        key: char,
        char,
        ...NO_MODIFIERS,
        shift: char !== char.toLowerCase(),
      },
      consumed: charLen,
    };
  }

  /**
   * xterm modifier parameter: "1;<1 + bitmask>"
   */
  private parseModifiers(params: string): { ctrl: boolean; alt: boolean; shift: boolean; meta: boolean } {
    const parts = params.split(';');
    const raw = parts[1];
    if (raw === undefined) {
      return { ...NO_MODIFIERS };
    }

    const mod = parseInt(raw, 10) - 1;
    return {
      shift: (mod & 1) !== 0,
      alt: (mod & 2) !== 0,
      ctrl: (mod & 4) !== 0,
      meta: (mod & 8) !== 0,
    };
  }
}
