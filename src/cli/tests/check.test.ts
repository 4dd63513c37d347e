/* eslint-disable no-console */
import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals'
import { writeFile, mkdir, rm, access } from 'fs/promises'
import { join } from 'path'
import { runCli } from '../cli'
import { logger } from '../../logger'
import { createHttpClient, HttpClient } from '../../probe/http-client'
import { readTable } from '../../table/csv'

const TEST_DIR = join(__dirname, '../../../tmp/cli-check-tests')

jest.mock('../../probe/http-client', () => ({
  createHttpClient: jest.fn(),
}))

jest.mock('../../logger', () => ({
  logger: {
    info: jest.fn(),
    error: jest.fn(),
    warn: jest.fn(),
    debug: jest.fn(),
  },
  setLogLevel: jest.fn(),
}))

describe('check command', () => {
  let head: jest.Mock<HttpClient['head']>
  let get: jest.Mock<HttpClient['get']>
  let logSpy: jest.SpiedFunction<typeof console.log>
  let errorSpy: jest.SpiedFunction<typeof console.error>

  const inputPath = join(TEST_DIR, 'input/products.csv')
  const outputPath = join(TEST_DIR, 'output/nested/broken.csv')

  const printed = () => logSpy.mock.calls.map((args) => args.map(String).join(' ')).join('\n')

  beforeEach(async () => {
    jest.clearAllMocks()
    await mkdir(join(TEST_DIR, 'input'), { recursive: true })

    head = jest.fn<HttpClient['head']>().mockImplementation(async (url) => ({
      status: url.endsWith('/missing.png') ? 404 : 200,
    }))
    get = jest.fn<HttpClient['get']>()
    jest.mocked(createHttpClient).mockReturnValue({ head, get })

    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined)
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined)
    process.exitCode = undefined
  })

  afterEach(async () => {
    logSpy.mockRestore()
    errorSpy.mockRestore()
    process.exitCode = undefined
    await rm(TEST_DIR, { recursive: true, force: true })
  })

  it('should write broken rows and print the summary', async () => {
    await writeFile(
      inputPath,
      'SKU,url\nA1,http://a.test/ok.png\nB2,http://a.test/missing.png\nC3,\n',
    )

    await runCli(['--input', inputPath, '--output', outputPath, '--column', 'url', '--quiet'])

    expect(printed().split('\n')).toEqual(['Checked 3 rows.', 'Broken rows: 2', `Wrote: ${outputPath}`])
    await expect(readTable(outputPath)).resolves.toEqual({
      columns: ['SKU', 'url', 'IMAGE_STATUS'],
      rows: [
        { SKU: 'B2', url: 'http://a.test/missing.png', IMAGE_STATUS: '404' },
        { SKU: 'C3', url: '', IMAGE_STATUS: 'empty' },
      ],
    })
    expect(head).toHaveBeenCalledTimes(2)
    expect(get).not.toHaveBeenCalled()
    expect(process.exitCode).toBeUndefined()
  })

  it('should accept the explicit check command and option aliases', async () => {
    await writeFile(inputPath, 'IMAGE_URLS\nhttp://a.test/missing.png\n')

    await runCli(['check', '-i', inputPath, '-o', outputPath, '-w', '2', '-t', '3'])

    expect(printed()).toContain('Broken rows: 1')
    expect(head).toHaveBeenCalledWith('http://a.test/missing.png', { timeout: 3000 })
    expect(createHttpClient).toHaveBeenCalledWith({ maxRedirects: 30, userAgent: undefined })
  })

  it('should print a JSON summary with --json', async () => {
    await writeFile(inputPath, 'IMAGE_URLS\nhttp://a.test/ok.png\nhttp://a.test/missing.png\n')

    await runCli(['-i', inputPath, '-o', outputPath, '--json'])

    const report: unknown = JSON.parse(printed())
    expect(report).toMatchObject({
      checked: 2,
      broken: 1,
      input: { path: inputPath, column: 'IMAGE_URLS' },
      output: { path: outputPath },
    })
  })

  it('should fail without probing when the column is missing', async () => {
    await writeFile(inputPath, 'SKU,PHOTO\nA1,http://a.test/ok.png\n')

    await runCli(['-i', inputPath, '-o', outputPath])

    expect(process.exitCode).toBe(1)
    expect(logger.error).toHaveBeenCalledWith("Column 'IMAGE_URLS' not found. Columns: [SKU, PHOTO]")
    expect(head).not.toHaveBeenCalled()
    await expect(access(outputPath)).rejects.toThrow()
  })

  it('should fail when no input path is configured', async () => {
    await runCli(['-o', outputPath])

    expect(process.exitCode).toBe(1)
    expect(logger.error).toHaveBeenCalledWith(
      'Configuration validation failed:\ninput (--input, IMGAUDIT_INPUT): An input CSV path is required',
    )
  })

  it('should read defaults from a config file', async () => {
    await writeFile(inputPath, 'PHOTO\nhttp://a.test/missing.png\n')
    const configPath = join(TEST_DIR, 'imgaudit.config.json')
    await writeFile(configPath, JSON.stringify({ column: 'PHOTO', output: outputPath }))

    await runCli(['-c', configPath, '-i', inputPath, '-q'])

    expect(printed().split('\n')).toEqual(['Checked 1 rows.', 'Broken rows: 1', `Wrote: ${outputPath}`])
  })
})

describe('print-config command', () => {
  let logSpy: jest.SpiedFunction<typeof console.log>
  let errorSpy: jest.SpiedFunction<typeof console.error>

  beforeEach(async () => {
    await mkdir(TEST_DIR, { recursive: true })
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined)
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined)
    process.exitCode = undefined
  })

  afterEach(async () => {
    logSpy.mockRestore()
    errorSpy.mockRestore()
    process.exitCode = undefined
    await rm(TEST_DIR, { recursive: true, force: true })
  })

  it('should print the resolved configuration', async () => {
    const configPath = join(TEST_DIR, 'custom.json')
    await writeFile(configPath, JSON.stringify({ input: 'in.csv', output: 'out.csv', workers: 6 }))

    await runCli(['print-config', '--config', configPath])

    const printedConfig: unknown = JSON.parse(String(logSpy.mock.calls[0]?.[0]))
    expect(printedConfig).toEqual({
      input: 'in.csv',
      output: 'out.csv',
      column: 'IMAGE_URLS',
      workers: 6,
      timeout: 10,
      retries: 2,
      backoffMs: 500,
      maxRedirects: 30,
    })
    expect(errorSpy).toHaveBeenCalledWith('✅ Configuration is valid')
  })

  it('should fail on an invalid configuration', async () => {
    const configPath = join(TEST_DIR, 'bad.json')
    await writeFile(configPath, JSON.stringify({ input: 'in.csv', output: 'out.csv', workers: 0 }))

    await runCli(['print-config', '--config', configPath])

    expect(process.exitCode).toBe(1)
    expect(logSpy).not.toHaveBeenCalled()
  })
})
