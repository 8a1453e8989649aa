/**
 * Tool definitions and handlers for the converter MCP server
 */

import * as fs from 'fs';
import * as path from 'path';
import { ConvertError, convert, normalizeInput, parse, validate } from '../../src/index';
import type { InputFormat } from '../../src/index';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';

export type ToolResult = {
  content: { type: 'text'; text: string }[];
  isError?: boolean;
};

export type ToolArguments = Record<string, unknown> | undefined;

export const TOOLS: Tool[] = [
  {
    name: 'convert_text',
    description: 'Convert a JSON document to XML or an XML document to JSON. The input format is detected from the first character unless given.',
    inputSchema: {
      type: 'object',
      properties: {
        text: {
          type: 'string',
          description: 'Document to convert',
        },
        format: {
          type: 'string',
          enum: ['json', 'xml'],
          description: 'Input format (default: detected)',
        },
      },
      required: ['text'],
    },
  },
  {
    name: 'convert_file',
    description: 'Read a JSON or XML file, trim every line, and return it converted to the other format.',
    inputSchema: {
      type: 'object',
      properties: {
        path: {
          type: 'string',
          description: 'Path to the file to convert',
        },
        outputPath: {
          type: 'string',
          description: 'Optional path to write the converted document to',
        },
      },
      required: ['path'],
    },
  },
  {
    name: 'validate_text',
    description: 'Check whether a document parses as JSON or XML without converting it.',
    inputSchema: {
      type: 'object',
      properties: {
        text: {
          type: 'string',
          description: 'Document to check',
        },
      },
      required: ['text'],
    },
  },
  {
    name: 'describe_text',
    description: 'Parse a document and list every element with its path, value and attributes.',
    inputSchema: {
      type: 'object',
      properties: {
        text: {
          type: 'string',
          description: 'Document to describe',
        },
      },
      required: ['text'],
    },
  },
];

const EMPTY_INPUT = 'Input is empty';

function text(value: string): ToolResult {
  return { content: [{ type: 'text', text: value }] };
}

function failure(message: string): ToolResult {
  return { content: [{ type: 'text', text: `Error: ${message}` }], isError: true };
}

function requireString(args: ToolArguments, key: string): string {
  const value = args?.[key];
  if (typeof value !== 'string') {
    throw new Error(`Argument "${key}" must be a string`);
  }
  return value;
}

function optionalString(args: ToolArguments, key: string): string | undefined {
  return args?.[key] === undefined ? undefined : requireString(args, key);
}

function optionalFormat(args: ToolArguments): InputFormat | undefined {
  const format = optionalString(args, 'format');
  if (format === undefined || format === 'json' || format === 'xml') {
    return format;
  }
  throw new Error(`Unsupported format: ${format}`);
}

/**
 * Run one tool call; failures come back as `isError` results
 */
export async function handleToolCall(name: string, args: ToolArguments): Promise<ToolResult> {
  try {
    switch (name) {
      case 'convert_text': {
        const source = requireString(args, 'text');
        if (source.trim() === '') return text(EMPTY_INPUT);

        return text(convert(source, { format: optionalFormat(args) }).output);
      }

      case 'convert_file': {
        const filePath = requireString(args, 'path');
        const outputPath = optionalString(args, 'outputPath');
        const absolutePath = path.resolve(filePath);

        if (!fs.existsSync(absolutePath)) {
          return failure(`File not found: ${filePath}`);
        }

        const source = normalizeInput(await fs.promises.readFile(absolutePath, 'utf-8'));
        if (source === '') return text(EMPTY_INPUT);

        const { output } = convert(source);
        if (outputPath === undefined) {
          return text(output);
        }

        await fs.promises.writeFile(path.resolve(outputPath), output, 'utf-8');
        return {
          content: [
            { type: 'text', text: output },
            { type: 'text', text: `Wrote ${outputPath}` },
          ],
        };
      }

      case 'validate_text': {
        const source = requireString(args, 'text');
        const result = validate(source);
        if (result.valid && result.format !== undefined) {
          return text(`Valid ${result.format} document`);
        }
        return text(`Invalid document\n${result.error?.toString() ?? 'unknown error'}`);
      }

      case 'describe_text': {
        const source = requireString(args, 'text');
        if (source.trim() === '') return text(EMPTY_INPUT);

        return text(parse(source).root.toString());
      }

      default:
        return failure(`Unknown tool: ${name}`);
    }
  } catch (error) {
    if (error instanceof ConvertError) {
      return failure(error.toString());
    }
    return failure(error instanceof Error ? error.message : String(error));
  }
}
