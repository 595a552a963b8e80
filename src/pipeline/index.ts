export {
  runPipeline,
  OUTPUT_FILES,
  type OutputKind,
  type PipelineOptions,
  type PipelineOutputs,
  type PipelineRun,
} from './pipeline.js'
