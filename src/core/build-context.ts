import type {Buffer} from 'node:buffer'
import {createHash} from 'node:crypto'
import {readFile} from 'node:fs/promises'
import {join} from 'node:path'
import {buffer as streamToBuffer} from 'node:stream/consumers'
import ignore from 'ignore'
import * as tar from 'tar'
import {isNotFound} from './utils.js'

export const devcontainerFolder = '.devcontainer'

/**
 * Tag of the image built from a Dockerfile: `devcontainer_` and the first 10
 * hex characters of the SHA-1 of its contents, so an unchanged Dockerfile
 * reuses the image.
 */
export function imageTagFor(dockerfileContents: string): string {
  const digest = createHash('sha1').update(dockerfileContents).digest('hex')
  return `devcontainer_${digest.slice(0, 10)}`
}

/**
 * Path filter built from `.devcontainer/.dockerignore`, with patterns relative
 * to the `.devcontainer` folder. Without the file nothing is ignored.
 */
export async function buildIgnoreFilter(devcontainerDir: string): Promise<(path: string) => boolean> {
  const ig = ignore()

  try {
    ig.add(await readFile(join(devcontainerDir, '.dockerignore'), 'utf8'))
  } catch (error) {
    if (!isNotFound(error)) {
      throw error
    }
  }

  return (path: string) => {
    if (path === '') {
      return false
    }

    // Test both variants to handle directory-only patterns (e.g. "dist/")
    return ig.ignores(path) || ig.ignores(path + '/')
  }
}

/**
 * Gzipped tar of the project's `.devcontainer` folder, entries prefixed with
 * `.devcontainer/`.
 */
export async function packBuildContext(projectPath: string): Promise<Buffer> {
  const shouldIgnore = await buildIgnoreFilter(join(projectPath, devcontainerFolder))

  const stream = tar.create(
    {
      cwd: projectPath,
      gzip: true,
      filter(path) {
        const relative = path.replace(/^\.devcontainer\/?/, '')
        return !shouldIgnore(relative)
      }
    },
    [devcontainerFolder]
  )

  return streamToBuffer(stream)
}
