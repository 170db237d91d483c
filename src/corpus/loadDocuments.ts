/**
 * 从磁盘加载预处理后的文档
 *
 * .txt   原始文本；词元为按空白切分的结果，不做归一化
 * .json  词元字符串数组，或 { text, tokens? }
 */

import { readFile, readdir, stat } from 'fs/promises'
import { basename, extname, join, resolve } from 'path'
import { z } from 'zod'
import { AppError } from '../shared/error.js'
import { ensureError } from '../shared/assertError.js'
import { createLogger } from '../shared/logger.js'
import { fromPromise, isOk, mapErr } from '../shared/result.js'
import type { Document } from './types.js'

const logger = createLogger('corpus')

export const SUPPORTED_EXTENSIONS = ['txt', 'json'] as const

export type DocumentExtension = (typeof SUPPORTED_EXTENSIONS)[number]

function isSupportedExtension(extension: string): extension is DocumentExtension {
  return SUPPORTED_EXTENSIONS.some(supported => supported === extension)
}

const tokenDocumentSchema = z.union([
  z.array(z.string()),
  z.object({
    text: z.string(),
    tokens: z.array(z.string()).optional(),
  }),
])

export interface LoadDocumentsOptions {
  /** 要读取的扩展名，不带点 */
  extensions?: readonly string[]
  /** 文件数少于此值时报错 */
  minFiles?: number
}

/** 加载失败而被跳过的文件 */
export interface SkippedFile {
  path: string
  error: AppError
}

export interface DocumentCollection {
  documents: Document[]
  skipped: SkippedFile[]
}

export function splitTokens(text: string): string[] {
  return text.split(/\s+/).filter(token => token.length > 0)
}

function fileExtension(path: string): string {
  return extname(path).slice(1).toLowerCase()
}

function parseTokenDocument(path: string, content: string): Pick<Document, 'text' | 'tokens'> {
  let raw: unknown
  try {
    raw = JSON.parse(content)
  } catch (e) {
    throw AppError.invalidTokens(path, ensureError(e).message)
  }

  const parsed = tokenDocumentSchema.safeParse(raw)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    throw AppError.invalidTokens(path, issue?.message ?? 'unexpected shape')
  }

  const data = parsed.data
  if (Array.isArray(data)) {
    return { text: data.join(' '), tokens: data }
  }
  return { text: data.text, tokens: data.tokens ?? splitTokens(data.text) }
}

export async function loadDocument(path: string): Promise<Document> {
  const extension = fileExtension(path)
  if (!isSupportedExtension(extension)) {
    throw AppError.unsupportedFile(path)
  }

  let content: string
  try {
    content = await readFile(path, 'utf-8')
  } catch (e) {
    throw AppError.fromError(ensureError(e))
  }

  const { text, tokens } =
    extension === 'json'
      ? parseTokenDocument(path, content)
      : { text: content, tokens: splitTokens(content) }

  logger.debug(`Loaded ${basename(path)} (${text.length} chars, ${tokens.length} tokens)`)
  return { name: basename(path), path, text, tokens }
}

/**
 * 加载 `dir` 下所有匹配的文件，按文件名排序。
 * 加载失败的文件不中断，记入 skipped。
 */
export async function collectDocuments(
  dir: string,
  options: LoadDocumentsOptions = {}
): Promise<DocumentCollection> {
  const { extensions = SUPPORTED_EXTENSIONS, minFiles = 2 } = options
  const root = resolve(dir)

  const info = await fromPromise(stat(root))
  if (!info.ok || !info.value.isDirectory()) {
    throw AppError.pathNotFound(dir)
  }

  const wanted = extensions.map(ext => ext.toLowerCase())
  const entries = await readdir(root, { withFileTypes: true })
  const paths = entries
    .filter(entry => entry.isFile() && wanted.includes(fileExtension(entry.name)))
    .map(entry => entry.name)
    .sort()
    .map(file => join(root, file))

  if (paths.length < minFiles) {
    throw AppError.minimumFiles(paths.length, minFiles)
  }

  const loaded = await Promise.all(
    paths.map(async path => ({
      path,
      result: mapErr(await fromPromise(loadDocument(path)), error =>
        error instanceof AppError ? error : AppError.fromError(error)
      ),
    }))
  )

  const collection: DocumentCollection = { documents: [], skipped: [] }
  for (const { path, result } of loaded) {
    if (isOk(result)) {
      collection.documents.push(result.value)
    } else {
      collection.skipped.push({ path, error: result.error })
    }
  }

  logger.debug(
    `Loaded ${collection.documents.length} documents from ${root}, skipped ${collection.skipped.length}`
  )
  return collection
}

/**
 * 同 collectDocuments，但第一个加载失败的文件使整个调用失败。
 */
export async function loadDocuments(
  dir: string,
  options: LoadDocumentsOptions = {}
): Promise<Document[]> {
  const { documents, skipped } = await collectDocuments(dir, options)
  const [first] = skipped
  if (first) throw first.error
  return documents
}
