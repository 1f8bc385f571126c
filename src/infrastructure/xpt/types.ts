/**
 * SAS 传输格式（XPORT）数据模型
 */

/** 传输格式版本：5 对应 LIBRARY，8 对应 LIBV8 */
export type XptVersion = 5 | 8;

/** 字符单元编码 */
export type XptTextEncoding = 'utf8' | 'latin1';

/**
 * 数值缺失值，`.`、`._` 或 `.A`–`.Z`
 */
export interface XptMissing {
  missing: string;
}

/** 单元格取值 */
export type XptCell = string | number | XptMissing;

/** 格式或输入格式 */
export interface XptFormatSpec {
  name: string;
  length: number;
  decimals: number;
}

export type XptVariableType = 'numeric' | 'character';

/**
 * 变量元数据
 */
export interface XptVariable {
  name: string;
  label: string;
  type: XptVariableType;
  /** 字节长度 */
  length: number;
  format: XptFormatSpec;
  informat: XptFormatSpec;
  /** 0 左对齐，1 右对齐 */
  justification: number;
}

/**
 * 数据集（成员）
 */
export interface XptMember {
  name: string;
  label: string;
  /** 数据集类型，例如 `DATA` */
  datasetType: string;
  sasVersion: string;
  os: string;
  /** 原样保留的 16 字符时间戳，例如 `01JAN24:10:00:00` */
  created: string;
  modified: string;
  variables: XptVariable[];
  rows: XptCell[][];
}

/**
 * 传输库
 */
export interface XptLibrary {
  version: XptVersion;
  sasVersion: string;
  os: string;
  created: string;
  modified: string;
  members: XptMember[];
}

/**
 * 类型守卫：是否为缺失值
 */
export function isXptMissing(cell: XptCell): cell is XptMissing {
  return typeof cell === 'object';
}
