import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import * as fs from 'fs/promises'
import * as os from 'os'
import * as path from 'path'
import { pathToFileURL } from 'url'
import { isMainModule, writeFileAtomic } from './filesystem.js'

describe('filesystem utils', () => {
  let dir: string

  beforeEach(async () => {
    dir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'cloudtune-fs-')))
  })

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true })
  })

  describe('isMainModule', () => {
    it('should match the script it was started with', async () => {
      const script = path.join(dir, 'index.js')
      await fs.writeFile(script, '')

      expect(isMainModule(pathToFileURL(script).href, script)).toBe(true)
      expect(isMainModule(pathToFileURL(path.join(dir, 'cli.js')).href, script)).toBe(false)
    })

    it('should follow a bin symlink to the module', async () => {
      const script = path.join(dir, 'index.js')
      const bin = path.join(dir, 'cloudtune')
      await fs.writeFile(script, '')
      await fs.symlink(script, bin)

      expect(isMainModule(pathToFileURL(script).href, bin)).toBe(true)
    })

    it('should be false without a script', () => {
      expect(isMainModule('file:///app/dist/src/index.js', undefined)).toBe(false)
    })
  })

  describe('writeFileAtomic', () => {
    it('should create parent directories and leave no temp file', async () => {
      const target = path.join(dir, 'nested', 'out.md')

      await writeFileAtomic(target, '# done\n')

      await expect(fs.readFile(target, 'utf-8')).resolves.toBe('# done\n')
      await expect(fs.readdir(path.dirname(target))).resolves.toEqual(['out.md'])
    })
  })
})
