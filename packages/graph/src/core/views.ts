import type { Association, AssociationView, Element, ElementView } from "./model.js";

export function toElementView(element: Element): ElementView {
  return {
    path: element.path,
    name: element.name,
    type: element.type,
    attributes: { ...element.attributes },
    parentPath: element.parent ? element.parent.path : null,
    childPaths: element.children.map((child) => child.path),
  };
}

export function toAssociationView(association: Association): AssociationView {
  return {
    from: association.from,
    to: association.to,
    type: association.type,
    attributes: { ...association.attributes },
  };
}
