import { Binding, BindingKind, BindingSite, allParameters, analyzeScopes } from '../../ast/scope';
import { isKeyword } from '../../ast/parser';
import { walk } from '../../ast/traverse';
import { isObfuscatedName } from '../../helpers/naming';
import { LogFunction, Transformation, TransformationProperties } from '../transformation';

const PREFIXES: { [kind in BindingKind]: string } = {
    function: 'func',
    class: 'Class',
    parameter: 'arg',
    local: 'var',
    global: 'var',
    import: 'var'
};

/**
 * Gives obfuscator-generated names readable replacements. Every binding is
 * renamed at all of its sites and references, including the ones in nested
 * scopes that capture it.
 */
export class IdentifierRenamer extends Transformation {
    public static readonly properties: TransformationProperties = {
        key: 'identifierRenaming'
    };
    private readonly usedNames = new Set<string>();
    private readonly counters = new Map<string, number>();

    /**
     * Executes the transformation.
     * @param log The log function.
     */
    public execute(log: LogFunction): boolean {
        const scopes = analyzeScopes(this.module);
        const keywordArguments = this.collectIdentifiers();
        const hasDynamicScope = scopes.allScopes().some(s => s.isDynamic);

        for (const scope of scopes.allScopes()) {
            if (scope.kind == 'class' || scope.descendants().some(s => s.isDynamic)) {
                continue;
            } else if (scope == scopes.root && hasDynamicScope) {
                continue;
            }

            for (const binding of scope.bindings.values()) {
                if (this.isRenamable(binding, keywordArguments)) {
                    this.rename(binding, this.createName(PREFIXES[binding.kind]));
                }
            }
        }

        if (this.hasChanged()) {
            log(`Renamed ${this.context.log.renames.length} identifier(s)`);
        }
        return this.hasChanged();
    }

    private isRenamable(binding: Binding, keywordArguments: Set<string>): boolean {
        return (
            binding.kind != 'import' &&
            !binding.sites.some(s => s.kind == 'alias') &&
            isObfuscatedName(binding.name) &&
            !(binding.kind == 'parameter' && keywordArguments.has(binding.name))
        );
    }

    /**
     * Renames a binding everywhere it is written, read or deleted.
     * @param binding The binding.
     * @param name The new name.
     */
    private rename(binding: Binding, name: string): void {
        binding.sites.forEach(site => renameSite(site, name));
        for (const node of [...binding.references, ...binding.deletions]) {
            node.id = name;
        }
        this.context.log.recordRename(binding.name, name, binding.kind);
        this.setChanged();
    }

    /**
     * Returns the next unused name with the given prefix.
     * @param prefix The prefix.
     * @returns The name.
     */
    private createName(prefix: string): string {
        let n = this.counters.get(prefix) ?? 0;
        let name: string;
        do {
            n++;
            name = `${prefix}_${n}`;
        } while (this.usedNames.has(name) || isKeyword(name));

        this.counters.set(prefix, n);
        this.usedNames.add(name);
        return name;
    }

    /**
     * Records every identifier in the module as used.
     * @returns The names passed as keyword arguments anywhere.
     */
    private collectIdentifiers(): Set<string> {
        const keywordArguments = new Set<string>();
        const use = (name: string | undefined): void => {
            if (name) {
                this.usedNames.add(name);
            }
        };

        walk(this.module, node => {
            switch (node.type) {
                case 'Name':
                    use(node.id);
                    break;
                case 'Attribute':
                    use(node.attr);
                    break;
                case 'FunctionDef':
                case 'ClassDef':
                    use(node.name);
                    if (node.type == 'FunctionDef') {
                        allParameters(node.args).forEach(p => use(p.name));
                    }
                    break;
                case 'Lambda':
                    allParameters(node.args).forEach(p => use(p.name));
                    break;
                case 'Import':
                case 'ImportFrom':
                    node.names.forEach(alias => {
                        alias.name.split('.').forEach(use);
                        use(alias.asname);
                    });
                    break;
                case 'Global':
                case 'Nonlocal':
                    node.names.forEach(use);
                    break;
                case 'Try':
                    node.handlers.forEach(h => use(h.name));
                    break;
                case 'Call':
                    node.keywords.forEach(k => {
                        use(k.arg);
                        if (k.arg) {
                            keywordArguments.add(k.arg);
                        }
                    });
                    break;
            }
        });
        return keywordArguments;
    }
}

function renameSite(site: BindingSite, name: string): void {
    switch (site.kind) {
        case 'name':
            site.node.id = name;
            break;
        case 'definition':
        case 'parameter':
        case 'handler':
            site.node.name = name;
            break;
        case 'declaration':
            site.node.names[site.index] = name;
            break;
        case 'alias':
            site.node.asname = name;
            break;
    }
}
