export type SeekOrigin = 'start' | 'current' | 'end';

export interface ObjectInfo {
  name: string;
  size: number;
  modifiedAt: Date;
}

export interface ObjectInfoView {
  name: string;
  size: number;
  modifiedAt: string;
}

export function toObjectInfoView(info: ObjectInfo): ObjectInfoView {
  return {
    name: info.name,
    size: info.size,
    modifiedAt: info.modifiedAt.toISOString(),
  };
}
