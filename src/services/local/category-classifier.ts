import { CategoryTable } from '../../types';
import { CATEGORY_TABLE, MISC_CATEGORY, MISC_CATEGORY_LABEL } from '../../core/constants';

/**
 * Maps file extensions to category names using a fixed table.
 */
export class CategoryClassifier {
  private readonly categories: CategoryTable;
  private readonly lookup = new Map<string, string>();

  constructor(categories: CategoryTable = CATEGORY_TABLE) {
    this.categories = categories;

    // Earlier categories win when an extension is listed twice
    for (const category of categories) {
      for (const extension of category.extensions) {
        const key = extension.toLowerCase();
        if (!this.lookup.has(key)) {
          this.lookup.set(key, category.name);
        }
      }
    }
  }

  classify(extension: string): string {
    return this.lookup.get(extension.toLowerCase()) ?? MISC_CATEGORY;
  }

  /**
   * Category names in table order, followed by the misc category
   */
  getCategoryNames(): string[] {
    return [...this.categories.map((category) => category.name), MISC_CATEGORY];
  }

  getCategoryLabel(name: string): string {
    if (name === MISC_CATEGORY) {
      return MISC_CATEGORY_LABEL;
    }
    return name.charAt(0).toUpperCase() + name.slice(1).toLowerCase();
  }
}
