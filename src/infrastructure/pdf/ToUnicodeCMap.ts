/**
 * ToUnicode CMap：字形编码到 Unicode 文本的映射
 */
export class ToUnicodeCMap {
  /**
   * @param mappings - 编码到文本的映射
   * @param codeLength - 每个编码的字节数
   */
  constructor(
    readonly mappings: ReadonlyMap<number, string>,
    readonly codeLength: number,
  ) {}

  lookup(code: number): string | undefined {
    return this.mappings.get(code);
  }

  /**
   * 解析 CMap 文本中的 codespacerange、bfchar 与 bfrange 段
   */
  static parse(source: string): ToUnicodeCMap {
    const mappings = new Map<number, string>();
    let codeLength: number | null = null;

    for (const section of sections(source, 'codespacerange')) {
      const first = /<([0-9A-Fa-f]+)>/.exec(section);
      if (first) {
        codeLength = Math.ceil(first[1].length / 2);
        break;
      }
    }

    for (const section of sections(source, 'bfchar')) {
      const pattern = /<([0-9A-Fa-f]+)>\s*<([0-9A-Fa-f]*)>/g;
      for (let match = pattern.exec(section); match; match = pattern.exec(section)) {
        codeLength ??= Math.ceil(match[1].length / 2);
        mappings.set(parseInt(match[1], 16), decodeUtf16Hex(match[2]));
      }
    }

    for (const section of sections(source, 'bfrange')) {
      const pattern =
        /<([0-9A-Fa-f]+)>\s*<([0-9A-Fa-f]+)>\s*(<[0-9A-Fa-f]*>|\[[^\]]*\])/g;
      for (let match = pattern.exec(section); match; match = pattern.exec(section)) {
        codeLength ??= Math.ceil(match[1].length / 2);
        const low = parseInt(match[1], 16);
        const high = parseInt(match[2], 16);
        const target = match[3];

        if (target.startsWith('[')) {
          const items = target.match(/<[0-9A-Fa-f]*>/g) ?? [];
          items.forEach((item, offset) => {
            if (low + offset <= high) {
              mappings.set(low + offset, decodeUtf16Hex(item.slice(1, -1)));
            }
          });
          continue;
        }

        // 目标字符串最后一个码元随编码递增
        const units = utf16Units(target.slice(1, -1));
        const last = units.length - 1;
        for (let code = low; code <= high && last >= 0; code++) {
          const shifted = [...units];
          shifted[last] = units[last] + (code - low);
          mappings.set(code, String.fromCharCode(...shifted));
        }
      }
    }

    return new ToUnicodeCMap(mappings, codeLength ?? 1);
  }
}

function sections(source: string, keyword: string): string[] {
  const pattern = new RegExp(`begin${keyword}([\\s\\S]*?)end${keyword}`, 'g');
  const found: string[] = [];
  for (let match = pattern.exec(source); match; match = pattern.exec(source)) {
    found.push(match[1]);
  }
  return found;
}

function utf16Units(hex: string): number[] {
  const units: number[] = [];
  for (let i = 0; i + 4 <= hex.length; i += 4) {
    units.push(parseInt(hex.slice(i, i + 4), 16));
  }
  // 两位十六进制的单字节目标
  if (units.length === 0 && hex.length === 2) {
    units.push(parseInt(hex, 16));
  }
  return units;
}

function decodeUtf16Hex(hex: string): string {
  return String.fromCharCode(...utf16Units(hex));
}
