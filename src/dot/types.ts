// Layout engine output, as read from annotated DOT

export type DotAttributes = Record<string, string>;

export interface LayoutNodeRecord {
  name: string;
  // "x,y" in points, y up
  pos?: string;
  // inches
  width?: string;
  height?: string;
  url?: string;
  draw?: string;
  ldraw?: string;
  attributes: DotAttributes;
}

export interface LayoutEdgeRecord {
  tail: string;
  head: string;
  // "e,x,y s,x,y x,y x,y ..." Bézier control points
  pos?: string;
  draw?: string;
  ldraw?: string;
  hdraw?: string;
  tdraw?: string;
  hldraw?: string;
  tldraw?: string;
  attributes: DotAttributes;
}

export interface AnnotatedLayout {
  name?: string;
  directed: boolean;
  strict: boolean;
  // "xmin,ymin,xmax,ymax"
  bb?: string;
  // Root graph and cluster drawing directives, in source order
  drawAttributes: string[];
  nodes: LayoutNodeRecord[];
  edges: LayoutEdgeRecord[];
}
