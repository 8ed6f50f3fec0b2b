export interface ObjMap<T> {
  [key: string]: T;
}

export type ReadOnlyObjMap<T> = { readonly [key: string]: T };
