import { mkdir, writeFile } from 'node:fs/promises'
import * as path from 'node:path'

/** Write `contents` to `filePath`, creating parent directories as needed. */
export async function writeOutputFile(filePath: string, contents: string): Promise<void> {
  const dir = path.dirname(filePath)
  await mkdir(dir, { recursive: true })
  await writeFile(filePath, contents, 'utf-8')
}
