export { SitePipeline } from './site-pipeline';
export type { SitePipelineOptions } from './site-pipeline';
