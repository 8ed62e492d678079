export type {
	ConversionRule,
	Converter,
	ConverterLogger,
	ConverterOptions,
} from './convert';
export {
	assembleDocument,
	convertPageToDocument,
	createConverter,
	detectCodeLanguage,
	normalizeBlankLines,
} from './convert';
export type { DiagramKind } from './diagrams';
export {
	diagramKindOf,
	reconstructClass,
	reconstructDiagram,
	reconstructFlowchart,
	reconstructSequence,
	reconstructState,
} from './diagrams';
export type { ConvertedPage, ConvertHtmlOptions, PageLink } from './dom';
export {
	canonicalUrl,
	collectPageLinks,
	convertHtmlToDocument,
	findSidebarTitle,
	fromDom,
	parseHtml,
} from './dom';
export type { BoundingBox, Point } from './geometry';
export { resolveEdgeId } from './identifiers';
export type { ElementNode, RenderedNode, TextNode } from './nodes';
export { element, text } from './nodes';
export type { SiteConfig } from './rules';
export { ConfigError, defaultSiteConfigs, loadCustomConfigs } from './rules';
