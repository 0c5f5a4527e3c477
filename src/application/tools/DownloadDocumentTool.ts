import { z } from 'zod';
import type { DownloadedArtifact } from '../../domain/entities/DownloadedArtifact.js';
import { InvalidToolRequestError } from '../../domain/errors/DomainErrors.js';
import { defineTool, discardIfAbandoned } from './ToolDefinition.js';
import { findDocument } from './catalog.js';

export interface DownloadPayload extends DownloadedArtifact {
  documentType: string;
  title: string;
  format: 'pdf' | 'html';
  semester?: string;
}

/**
 * Tool: portal_download_document
 * 產生並下載官方文件（成績單、註冊證明…），回傳本機路徑。
 */
export const downloadDocumentTool = defineTool({
  name: 'download-document',
  mcpName: 'portal_download_document',
  description: 'Download an official document (e.g. historico_academico, comprovante_matricula) and return its local path',
  args: {
    documentType: z.string().min(1).describe('Document key, e.g. "historico_academico"'),
    format: z.enum(['pdf', 'html']).default('pdf').describe('Output format'),
    semester: z.string()
      .regex(/^\d{4}\.\d$/, 'semester must look like YYYY.N (e.g. 2024.1)')
      .optional()
      .describe('Academic period, for documents that take one'),
  },
  session: 'required',
  check: (args, env) => {
    const doc = findDocument(env.portal, args.documentType);
    if (!doc) {
      return [`Unknown document type "${args.documentType}". Available: ${Object.keys(env.portal.documents).join(', ')}`];
    }
    const problems: string[] = [];
    if (!doc.formats.includes(args.format)) {
      problems.push(`"${args.documentType}" is not available as ${args.format} (formats: ${doc.formats.join(', ')})`);
    }
    if (args.semester !== undefined && !doc.semesterField) {
      problems.push(`"${args.documentType}" does not take a semester`);
    }
    return problems;
  },
  run: async (ctx, args): Promise<DownloadPayload> => {
    const doc = findDocument(ctx.portal, args.documentType);
    if (!doc) {
      throw new InvalidToolRequestError(`Unknown document type "${args.documentType}"`);
    }

    const trigger = doc.trigger
      .replaceAll('{format}', args.format)
      .replaceAll('{semester}', args.semester ?? '');
    const result = await ctx.browser.download({
      pagePath: doc.path,
      trigger,
      semester: args.semester !== undefined && doc.semesterField
        ? { field: doc.semesterField, value: args.semester }
        : undefined,
      destinationDir: ctx.artifacts.tempDir,
    });

    await discardIfAbandoned(ctx, result.localPath);

    let artifact: DownloadedArtifact;
    try {
      artifact = await ctx.artifacts.claim(result.localPath, {
        documentType: args.documentType,
        format: args.format,
        sourceUrl: result.sourceUrl,
      });
    } catch (err) {
      await ctx.artifacts.discard(result.localPath);
      throw err;
    }
    await discardIfAbandoned(ctx, artifact.localPath);

    return { ...artifact, documentType: args.documentType, title: doc.title, format: args.format, semester: args.semester };
  },
  format: (payload) => [
    `Downloaded ${payload.title}${payload.semester ? ` (${payload.semester})` : ''}`,
    `Path: ${payload.localPath}`,
    `Size: ${payload.sizeBytes} bytes`,
  ].join('\n'),
});
