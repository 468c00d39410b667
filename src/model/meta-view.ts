import { MetaData } from './meta-data';

/** Presentation hint for a field (text box, date picker, ...) */
export class MetaView extends MetaData {
  static isMetaView(node: MetaData): node is MetaView {
    return node instanceof MetaView;
  }

  getViewType(): string {
    return this.subType;
  }

  getLabel(): string {
    const label = this.getAttrValue('label');
    return typeof label === 'string' ? label : this.getShortName();
  }
}
