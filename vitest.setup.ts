// IndexedDB for the store under Node
import "fake-indexeddb/auto";
