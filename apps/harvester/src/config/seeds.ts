import { readFile } from 'node:fs/promises'
import { z } from 'zod'
import { ConfigurationError } from '../errors.js'

const seedsFileSchema = z.object({
  seeds: z.array(z.string().trim().url()).min(1),
})

async function readText(file: string, what: string): Promise<string> {
  try {
    return await readFile(file, 'utf8')
  } catch (error) {
    throw new ConfigurationError(`Cannot read ${what} ${file}`, [], { cause: error })
  }
}

/**
 * Seed URLs from a `{ "seeds": [...] }` JSON file.
 *
 * @throws ConfigurationError
 */
export async function loadSeeds(file: string): Promise<string[]> {
  const text = await readText(file, 'seeds file')

  let json: unknown
  try {
    json = JSON.parse(text)
  } catch (error) {
    throw new ConfigurationError(`Seeds file ${file} is not valid JSON`, [], { cause: error })
  }

  const parsed = seedsFileSchema.safeParse(json)
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid seeds file ${file}`,
      parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
      { cause: parsed.error }
    )
  }
  return parsed.data.seeds
}

/**
 * One URL per line; blank lines and `#` comments are ignored.
 *
 * @throws ConfigurationError
 */
export async function loadUrlList(file: string): Promise<string[]> {
  const text = await readText(file, 'URL list')

  const urls: string[] = []
  const invalid: string[] = []
  text.split(/\r?\n/).forEach((raw, index) => {
    const line = raw.trim()
    if (line === '' || line.startsWith('#')) return
    if (z.string().url().safeParse(line).success) {
      urls.push(line)
    } else {
      invalid.push(`line ${index + 1}: ${line}`)
    }
  })

  if (invalid.length > 0) {
    throw new ConfigurationError(`Invalid URLs in ${file}`, invalid)
  }
  return urls
}
