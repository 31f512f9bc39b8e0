import { Class, ObjectConstructor } from '../common-types';
import { objectNewFromDefaultAndPartials } from '../common-utils';

export interface IWithOptions<TOptions> {
  get OptionsDefault(): TOptions;

  get options_(): TOptions;

  getOptions(): TOptions;

  setOptions(opts?: Partial<TOptions>): TOptions;
}

export type MixinWithOptions<TBase, TOptions> = TBase & Class<IWithOptions<TOptions>>;

export function mixinWithOptions<
  TBase extends ObjectConstructor,
  TOptions extends object> (Base: TBase, defaultOpts: TOptions): MixinWithOptions<TBase, TOptions> {
  return class WithOptions extends Base implements IWithOptions<TOptions> {
    get OptionsDefault (): TOptions {
      return defaultOpts;
    }

    private _options: TOptions;

    // eslint-disable-next-line @typescript-eslint/no-explicit-any
    constructor (...args: any[]) {
      super(...args);
      this._options = objectNewFromDefaultAndPartials(defaultOpts);
    }

    /**
     * Internal options object-ref, not a copy.
     *
     * Only safe as a local ref from within the subclass impl:
     * any call to `setOptions` replaces it, so a ref obtained earlier
     * goes stale.
     */
    get options_ (): TOptions {
      return this._options;
    }

    /**
     * @returns options (mutable copy)
     */
    getOptions (): TOptions {
      return Object.assign({}, this._options);
    }

    /**
     * Applies the partial on top of the current state. Properties missing
     * from both are filled from the mixin defaults. The argument is never
     * mutated or retained.
     */
    setOptions (opts: Partial<TOptions> = defaultOpts): TOptions {
      this._options = objectNewFromDefaultAndPartials(defaultOpts, this._options, opts);
      return this._options;
    }
  };
}
