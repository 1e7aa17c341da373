import { loadConfig } from './config.js'
import { runBatch } from './services/batch/batch.runner.js'
import { DocumentPipeline } from './services/extraction/document.pipeline.js'
import { StorageService } from './services/storage.service.js'

const config = loadConfig()
const storage = new StorageService({ rootDir: config.outputDir })
const pipeline = new DocumentPipeline({ config, storage })

const result = await runBatch({ inputDir: config.inputDir }, { pipeline, storage })
const failed = result.rows.filter((row) => row.status === 'failed').length
process.exitCode = failed > 0 && failed === result.rows.length ? 1 : 0
