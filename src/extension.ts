// The module 'vscode' contains the VS Code extensibility API
import * as vscode from 'vscode';
import { handleDocumentOpen, handleDocumentClose, ensureParsed } from './documentOpenHandler';
import { handleDocumentChange } from './documentChangeHandler';
import { handleVisibleEditorsChange } from './activeEditorHandler';
import { AnnotationRenderer } from './annotationRenderer';
import { DecorationSurface } from './decorationSurface';
import { DocumentTrees } from './documentTrees';
import { ScopeEchoController } from './scopeEchoController';
import { ScopeTargetRegistry, builtinScopeTargets } from './scopeTargets';
import { GrammarLoader } from './treeSitterBackend';
import { ScopeEchoServices } from './services';
import {
	getConfigFilePath,
	initializeConfigFile,
	loadConfig,
	refreshConfigCache,
	rendererOptionsFrom
} from './configuration';

let services: ScopeEchoServices | undefined;
let grammars: GrammarLoader | undefined;

function workspaceRoot(): string | undefined {
	return vscode.workspace.workspaceFolders?.[0]?.uri.fsPath;
}

// This method is called when your extension is activated
export function activate(context: vscode.ExtensionContext) {
	console.log('[scope-echo] Activating');

	const config = loadConfig(workspaceRoot());
	const registry = new ScopeTargetRegistry(builtinScopeTargets(), config.scopeTargets, config.grammars);
	const loader = new GrammarLoader((languageKey) => registry.grammarFor(languageKey));
	grammars = loader;
	const trees = new DocumentTrees(loader);
	const surface = new DecorationSurface(vscode.window);
	const renderer = new AnnotationRenderer(surface, registry, rendererOptionsFrom(config));
	const controller = new ScopeEchoController(renderer, trees, () => loadConfig(workspaceRoot()).minLines);
	const current: ScopeEchoServices = {
		registry,
		trees,
		surface,
		renderer,
		controller,
		getConfig: () => loadConfig(workspaceRoot())
	};
	services = current;

	const open = (document: vscode.TextDocument) => {
		handleDocumentOpen(document, current).catch((error: unknown) => {
			console.error('[scope-echo] Failed to handle document open:', error);
		});
	};

	// Toggle commands act on the active editor
	const withActiveDocument = (action: (documentId: string) => boolean) => () => {
		const editor = vscode.window.activeTextEditor;
		if (!editor) {
			vscode.window.showInformationMessage('Scope Echo: no active editor');
			return;
		}

		const document = editor.document;
		const enabled = action(document.uri.toString());
		if (enabled) {
			ensureParsed(document, current).catch((error: unknown) => {
				console.error('[scope-echo] Failed to parse document:', error);
			});
		}
		vscode.window.setStatusBarMessage(`Scope Echo ${enabled ? 'enabled' : 'disabled'}`, 2000);
	};

	const toggleCommand = vscode.commands.registerCommand('scope-echo.toggle', withActiveDocument(
		(documentId) => controller.toggle(documentId)
	));

	const enableCommand = vscode.commands.registerCommand('scope-echo.enable', withActiveDocument(
		(documentId) => {
			controller.enable(documentId);
			return true;
		}
	));

	const disableCommand = vscode.commands.registerCommand('scope-echo.disable', withActiveDocument(
		(documentId) => {
			controller.disable(documentId);
			return false;
		}
	));

	// Command to open configuration file
	const openConfigCommand = vscode.commands.registerCommand('scope-echo.openConfiguration', async () => {
		await openConfigFile();
	});

	// Command to initialize configuration file
	const initConfigCommand = vscode.commands.registerCommand('scope-echo.initializeConfiguration', () => {
		const success = initializeConfigFile(workspaceRoot());
		if (success) {
			vscode.window.showInformationMessage('Configuration file created successfully');
		} else {
			vscode.window.showErrorMessage('Failed to create configuration file');
		}
	});

	const onDidOpenTextDocument = vscode.workspace.onDidOpenTextDocument(open);

	const onDidCloseTextDocument = vscode.workspace.onDidCloseTextDocument((document) => {
		handleDocumentClose(document, current);
	});

	const onDidChangeTextDocument = vscode.workspace.onDidChangeTextDocument((event) => {
		try {
			handleDocumentChange(event, current);
		} catch (error) {
			console.error('[scope-echo] Failed to handle document change:', error);
		}
	});

	const onDidChangeVisibleTextEditors = vscode.window.onDidChangeVisibleTextEditors((editors) => {
		handleVisibleEditorsChange(editors, current);
	});

	// Watch for configuration file changes to refresh cache and recompute annotations
	const reloadConfiguration = () => {
		console.log('[scope-echo] Configuration file changed, reloading');
		const reloaded = refreshConfigCache(workspaceRoot());
		registry.reload(reloaded.scopeTargets, reloaded.grammars);
		renderer.updateOptions(rendererOptionsFrom(reloaded));
		loader.resetLanguages();
		trees.resetQueries();
		controller.refreshAll();

		// Enabled documents that had no grammar before may have one now
		vscode.workspace.textDocuments
			.filter(document => controller.isEnabled(document.uri.toString()))
			.forEach(document => {
				ensureParsed(document, current).catch((error: unknown) => {
					console.error('[scope-echo] Failed to parse document:', error);
				});
			});
	};
	const configWatcher = vscode.workspace.createFileSystemWatcher('**/.vscode/scope-echo.json');
	configWatcher.onDidChange(reloadConfiguration);
	configWatcher.onDidCreate(reloadConfiguration);
	configWatcher.onDidDelete(reloadConfiguration);

	context.subscriptions.push(toggleCommand);
	context.subscriptions.push(enableCommand);
	context.subscriptions.push(disableCommand);
	context.subscriptions.push(openConfigCommand);
	context.subscriptions.push(initConfigCommand);
	context.subscriptions.push(onDidOpenTextDocument);
	context.subscriptions.push(onDidCloseTextDocument);
	context.subscriptions.push(onDidChangeTextDocument);
	context.subscriptions.push(onDidChangeVisibleTextEditors);
	context.subscriptions.push(configWatcher);

	// Documents already open before activation
	vscode.workspace.textDocuments.forEach(open);
}

/**
 * Open configuration file in editor
 */
async function openConfigFile(): Promise<void> {
	const configPath = getConfigFilePath(workspaceRoot());
	if (!configPath) {
		vscode.window.showErrorMessage('No workspace folder is open');
		return;
	}

	if (!initializeConfigFile(workspaceRoot())) {
		vscode.window.showErrorMessage('Failed to create configuration file');
		return;
	}

	try {
		const document = await vscode.workspace.openTextDocument(configPath);
		await vscode.window.showTextDocument(document);
	} catch (error) {
		console.error('[scope-echo] Failed to open configuration file:', error);
		vscode.window.showErrorMessage('Failed to open configuration file');
	}
}

// This method is called when your extension is deactivated
export function deactivate() {
	if (services) {
		services.controller.dispose();
		services.renderer.dispose();
		services.trees.dispose();
		services.surface.dispose();
		services = undefined;
	}
	grammars?.dispose();
	grammars = undefined;
}
