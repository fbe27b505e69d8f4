export { type SearchFilters, ProjectApi } from './project.js';
export { ResourceApi, type Route } from './resource.js';
export { TagApi } from './tag.js';
export { UserApi } from './user.js';
export { type VersionFilters, VersionApi } from './version.js';
