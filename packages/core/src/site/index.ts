export { RESOURCE_TYPES, createSite } from './site';
export type { ResourceType, Site, SiteInput } from './site';
