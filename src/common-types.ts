export type Nullable<T> = T | null;

// Constructor-types as per the TypeScript Handbook (mixins need the any[] rest-arg form)
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type ObjectConstructor = new (...args: any[]) => object;
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type ConstructorOf<T extends object> = new (...args: any[]) => T;

export type Class<T extends object> = ConstructorOf<T>;
