import * as admin from "firebase-admin";

/**
 * Поля документа. Timestamp при чтении уже превращён в Date.
 */
export type DocumentFields = Record<string, unknown>;

export interface StoredDocument {
  id: string;
  fields: DocumentFields;
}

/**
 * Серверные операции над полем (arrayUnion, serverTimestamp)
 */
export class FieldOp {
  private constructor(
    readonly kind: "arrayUnion" | "serverTimestamp",
    readonly values: readonly unknown[]
  ) {}

  static arrayUnion(...values: unknown[]): FieldOp {
    return new FieldOp("arrayUnion", values);
  }

  static serverTimestamp(): FieldOp {
    return new FieldOp("serverTimestamp", []);
  }
}

export interface DocumentTransaction {
  get(collection: string, id: string): Promise<DocumentFields | null>;
  merge(collection: string, id: string, fields: DocumentFields): void;
  /** Документ должен существовать */
  update(collection: string, id: string, fields: DocumentFields): void;
}

/**
 * Узкий доступ к документному хранилищу, которым пользуются репозитории.
 */
export interface DocumentStore {
  get(collection: string, id: string): Promise<DocumentFields | null>;
  list(collection: string): Promise<StoredDocument[]>;
  merge(collection: string, id: string, fields: DocumentFields): Promise<void>;
  runTransaction<T>(update: (transaction: DocumentTransaction) => Promise<T>): Promise<T>;
}

function toFirestoreFields(fields: DocumentFields): admin.firestore.DocumentData {
  return Object.fromEntries(
    Object.entries(fields).map(([key, value]): [string, unknown] => {
      if (!(value instanceof FieldOp)) {
        return [key, value];
      }
      return [
        key,
        value.kind === "arrayUnion"
          ? admin.firestore.FieldValue.arrayUnion(...value.values)
          : admin.firestore.FieldValue.serverTimestamp()
      ];
    })
  );
}

function fromFirestoreFields(data: admin.firestore.DocumentData): DocumentFields {
  return Object.fromEntries(
    Object.entries(data).map(([key, value]: [string, unknown]): [string, unknown] => [
      key,
      value instanceof admin.firestore.Timestamp ? value.toDate() : value
    ])
  );
}

function fromSnapshot(snapshot: admin.firestore.DocumentSnapshot): DocumentFields | null {
  const data = snapshot.data();
  return snapshot.exists && data ? fromFirestoreFields(data) : null;
}

export class FirestoreDocumentStore implements DocumentStore {
  constructor(private readonly db: admin.firestore.Firestore) {}

  private ref(collection: string, id: string): admin.firestore.DocumentReference {
    return this.db.collection(collection).doc(id);
  }

  async get(collection: string, id: string): Promise<DocumentFields | null> {
    return fromSnapshot(await this.ref(collection, id).get());
  }

  async list(collection: string): Promise<StoredDocument[]> {
    const snapshot = await this.db.collection(collection).get();
    return snapshot.docs.map((doc) => ({ id: doc.id, fields: fromFirestoreFields(doc.data()) }));
  }

  async merge(collection: string, id: string, fields: DocumentFields): Promise<void> {
    await this.ref(collection, id).set(toFirestoreFields(fields), { merge: true });
  }

  runTransaction<T>(update: (transaction: DocumentTransaction) => Promise<T>): Promise<T> {
    return this.db.runTransaction((transaction) =>
      update({
        get: async (collection, id) => fromSnapshot(await transaction.get(this.ref(collection, id))),
        merge: (collection, id, fields) => {
          transaction.set(this.ref(collection, id), toFirestoreFields(fields), { merge: true });
        },
        update: (collection, id, fields) => {
          transaction.update(this.ref(collection, id), toFirestoreFields(fields));
        }
      })
    );
  }
}
