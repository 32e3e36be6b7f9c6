export { BlockViews, createBlockViews, type BlockViewsOptions, type ViewPage } from './views.js';
