/**
 * External function (tool) types
 */

/**
 * JSON-Schema-like parameter description of a tool
 */
export interface ToolParameters {
  type: 'object';
  properties: Record<string, unknown>;
  required?: string[] | undefined;
  [key: string]: unknown;
}

/**
 * Vendor-agnostic tool declaration handed to provider adapters
 */
export interface ToolDeclaration {
  name: string;
  description: string;
  parameters: ToolParameters;
}

/**
 * A discovered tool bound to the executable that provides it
 */
export interface FunctionDefinition extends ToolDeclaration {
  executable: string;
}

/**
 * What the tool loop needs from a function registry
 */
export interface FunctionCaller {
  toolDeclarations(): ToolDeclaration[];
  call(name: string, args: Record<string, unknown>): Promise<string>;
}
