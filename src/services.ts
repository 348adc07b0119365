import { AnnotationRenderer } from './annotationRenderer';
import { DecorationSurface } from './decorationSurface';
import { DocumentTrees } from './documentTrees';
import { ScopeEchoController } from './scopeEchoController';
import { ScopeTargetRegistry } from './scopeTargets';
import { ScopeEchoConfig } from './configuration';

/**
 * Everything the editor event handlers work with, created once on activation
 */
export interface ScopeEchoServices {
	registry: ScopeTargetRegistry;
	trees: DocumentTrees;
	surface: DecorationSurface;
	renderer: AnnotationRenderer<number>;
	controller: ScopeEchoController<number>;
	getConfig(): ScopeEchoConfig;
}
