import * as admin from 'firebase-admin';
import { getConfig } from '../config/runtimeConfig';

function app(): admin.app.App {
  if (!admin.apps.length) {
    const { databaseUrl } = getConfig();
    return admin.initializeApp(databaseUrl ? { databaseURL: databaseUrl } : undefined);
  }
  return admin.app();
}

export function firestore(): admin.firestore.Firestore {
  return app().firestore();
}

export function database(): admin.database.Database {
  return app().database();
}

export function messaging(): admin.messaging.Messaging {
  return app().messaging();
}
