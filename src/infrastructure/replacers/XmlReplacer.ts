import { DOMParser, XMLSerializer } from '@xmldom/xmldom';
import { BaseDocumentReplacer, TransformOutcome } from './BaseDocumentReplacer.js';
import { replaceLiteral } from '../../domain/services/textReplace.js';
import { CorruptInputError, errorMessage } from '../../domain/errors/DocumentErrors.js';

export const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

const ELEMENT_NODE = 1;
const TEXT_NODE = 3;
const CDATA_SECTION_NODE = 4;
const PROCESSING_INSTRUCTION_NODE = 7;

/**
 * 替换过程依赖的属性节点结构
 */
interface XmlAttributeNode {
  name: string;
  value: string;
  nodeValue: string | null;
}

/**
 * 替换过程依赖的 DOM 节点结构
 */
interface XmlTreeNode {
  nodeType: number;
  nodeName: string;
  childNodes: ArrayLike<XmlTreeNode>;
  attributes?: ArrayLike<XmlAttributeNode> | null;
  data?: string;
  replaceData?(offset: number, count: number, data: string): void;
}

function isNamespaceDeclaration(name: string): boolean {
  return name === 'xmlns' || name.startsWith('xmlns:');
}

/**
 * 深度优先、文档顺序（先父后子）替换文本、CDATA 与属性值
 * 标签名、属性名、注释与处理指令保持不变
 *
 * @returns 替换次数
 */
function replaceInTree(
  node: XmlTreeNode,
  searchText: string,
  replacementText: string,
): number {
  let count = 0;

  if (
    (node.nodeType === TEXT_NODE || node.nodeType === CDATA_SECTION_NODE) &&
    node.data !== undefined &&
    node.replaceData
  ) {
    const result = replaceLiteral(node.data, searchText, replacementText);
    if (result.count > 0) {
      node.replaceData(0, node.data.length, result.text);
      count += result.count;
    }
  }

  if (node.nodeType === ELEMENT_NODE && node.attributes) {
    for (let i = 0; i < node.attributes.length; i++) {
      const attr = node.attributes[i];
      if (isNamespaceDeclaration(attr.name)) continue;
      const result = replaceLiteral(attr.value, searchText, replacementText);
      if (result.count > 0) {
        attr.value = result.text;
        attr.nodeValue = result.text;
        count += result.count;
      }
    }
  }

  for (let i = 0; i < node.childNodes.length; i++) {
    count += replaceInTree(node.childNodes[i], searchText, replacementText);
  }

  return count;
}

function isXmlDeclaration(node: { nodeType: number; nodeName: string }): boolean {
  return node.nodeType === PROCESSING_INSTRUCTION_NODE && node.nodeName === 'xml';
}

/**
 * 解析 XML，收集 error/fatalError 级别的问题
 * @throws {CorruptInputError} 文档不是格式良好的 XML 时抛出
 */
function parseDocument(xml: string): ReturnType<DOMParser['parseFromString']> {
  const problems: string[] = [];
  const parser = new DOMParser({
    onError: (level, message) => {
      if (level !== 'warning') {
        problems.push(message);
      }
    },
  });

  let doc: ReturnType<DOMParser['parseFromString']>;
  try {
    doc = parser.parseFromString(xml, 'text/xml');
  } catch (error) {
    throw new CorruptInputError(`Invalid XML: ${errorMessage(error)}`);
  }
  if (problems.length > 0 || !doc.documentElement) {
    throw new CorruptInputError(
      `Invalid XML: ${problems[0] ?? 'no root element found'}`,
      { issues: problems },
    );
  }
  return doc;
}

/**
 * 对 XML 文本执行替换并重新序列化
 *
 * @param xml - XML 文本
 * @param searchText - 查找文本
 * @param replacementText - 替换文本
 * @returns 带 UTF-8 声明的新文档与替换次数
 * @throws {CorruptInputError} 文档不是格式良好的 XML 时抛出
 */
export function replaceInXml(
  xml: string,
  searchText: string,
  replacementText: string,
): { xml: string; count: number } {
  const doc = parseDocument(xml);
  const count = replaceInTree(doc, searchText, replacementText);

  // 源文件的声明由统一的 UTF-8 声明替代
  const serializer = new XMLSerializer();
  const parts: string[] = [];
  for (let i = 0; i < doc.childNodes.length; i++) {
    const child = doc.childNodes[i];
    if (isXmlDeclaration(child)) continue;
    parts.push(serializer.serializeToString(child));
  }
  const body = parts.join('').replace(/^\s+/, '');

  return { xml: `${XML_DECLARATION}\n${body}`, count };
}

/**
 * XML 替换器
 */
export class XmlReplacer extends BaseDocumentReplacer {
  readonly format = 'xml' as const;

  protected async transform(
    source: Buffer,
    searchText: string,
    replacementText: string,
  ): Promise<TransformOutcome> {
    const { xml, count } = replaceInXml(
      source.toString('utf8'),
      searchText,
      replacementText,
    );
    return { content: xml, replacements: count };
  }
}
