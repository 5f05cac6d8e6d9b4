/**
 * 核心类型定义
 * 规则目录、模板单元、目标文件与改写引擎契约共用的数据模型
 */

import type * as t from "@babel/types";
import type { Replacement } from "./text-patcher";

/**
 * 模板参数槽的类型，渲染时映射为 TypeScript 类型，匹配时用于兼容性检查
 */
export type SlotType = "context" | "error" | "any" | "boolean" | "string";

export interface ParamSlot {
  name: string;
  type: SlotType;
}

/** 调用表达式中被调用者所属的命名空间角色 */
export type NamespaceRole = "source" | "destination" | "helper";

export interface CalleeRef {
  namespace: NamespaceRole;
  member: string;
}

export type ShapeArg =
  | { kind: "param"; name: string }
  | { kind: "call"; call: CallShape }
  | { kind: "trailing" };

/**
 * 结构化的调用形状，例如 source.Equal(t, a, b, ...trailing)
 */
export interface CallShape {
  callee: CalleeRef;
  args: ShapeArg[];
}

/**
 * 一条语义替换规则：签名（不含尾部消息参数）、替换前形状、替换后形状
 */
export interface SubstitutionRule {
  readonly name: string;
  readonly signature: readonly ParamSlot[];
  readonly before: CallShape;
  readonly after: CallShape;
}

/** 尾部可选消息参数的一种数量变体 */
export interface ArityVariant {
  readonly count: number;
  readonly params: readonly ParamSlot[];
}

/** 模块绑定：模板中使用的别名和导入路径 */
export interface ModuleBinding {
  alias: string;
  path: string;
}

export interface TypeImport {
  name: string;
  path: string;
}

/**
 * 改写族：选择源 API / 目标 API 的名称与导入路径
 */
export interface RewriteFamily {
  name: string;
  source: ModuleBinding;
  destination: ModuleBinding;
  /** 仅当替换后形状引用 helper 命名空间时才会导入 */
  helper?: ModuleBinding;
  contextType: TypeImport;
}

/** 族标识已代入后的被调用者 */
export interface ConcreteCallee {
  alias: string;
  path: string;
  member: string;
}

export type ConcreteArg =
  | { kind: "param"; name: string }
  | { kind: "call"; call: ConcreteCall };

export interface ConcreteCall {
  callee: ConcreteCallee;
  args: ConcreteArg[];
}

export interface TemplateImport {
  local: string;
  path: string;
  kind: "namespace" | "type";
}

/**
 * 模板单元：一对签名相同的 before / after 函数及其所需导入
 */
export interface TemplateUnit {
  name: string;
  ordinal: number;
  rule: SubstitutionRule;
  family: RewriteFamily;
  arity: ArityVariant;
  signature: ParamSlot[];
  before: ConcreteCall;
  after: ConcreteCall;
  imports: TemplateImport[];
  source: string;
}

export type ImportKind = "namespace" | "default" | "named" | "side-effect";

/**
 * 文件导入列表中的一项绑定
 * declIndex / specIndex 指向其来源声明；新增的导入为 -1
 */
export interface ImportRecord {
  path: string;
  kind: ImportKind;
  local?: string;
  imported?: string;
  typeOnly: boolean;
  used: boolean;
  declIndex: number;
  specIndex: number;
}

/**
 * 正在迁移的目标文件，运行期间由编排器持有
 */
export interface TargetFile {
  readonly filePath: string;
  readonly packageName: string;
  readonly originalCode: string;
  ast: t.File;
  /** 规范导入集合，声明列表与输出文本均由它重新生成 */
  imports: ImportRecord[];
  replacements: Replacement[];
}

export interface WorkspacePackage {
  name: string;
  dir: string;
  files: string[];
  dependencies: string[];
}

export interface LoadedPackage {
  name: string;
  dir: string;
  files: TargetFile[];
}

export interface UnitHandle {
  readonly name: string;
  readonly ordinal: number;
  readonly source: string;
  readonly filePath?: string;
}

export interface ProgramImage {
  /** 模板单元（作为合成包）在前，目标包在后 */
  readonly packages: LoadedPackage[];
}

export interface Matcher {
  readonly unit: UnitHandle;
  apply(file: TargetFile): number;
}

/**
 * 外部改写引擎契约
 */
export interface RewriteEngine<TImage extends ProgramImage = ProgramImage> {
  readonly usage: string;
  registerUnit(name: string, sourceText: string, filePath?: string): UnitHandle;
  loadProgram(roots: WorkspacePackage[], units: UnitHandle[]): TImage;
  makeMatcher(program: TImage, unit: UnitHandle): Matcher;
  writeFile(filePath: string, file: TargetFile): void;
}
