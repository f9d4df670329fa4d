#!/usr/bin/env node
import 'dotenv/config';
import 'reflect-metadata';
import { loadCatalogConfig } from './config/catalog.config';
import { CatalogSession } from './editor/catalog-session';

const config = loadCatalogConfig();
const session = CatalogSession.fromConfig(config);
const revenue = session.getRevenueSummary();

console.log('Catalog Editor loaded');
console.log(`Owner: ${config.ownerActId}`);
console.log(`Data directory: ${config.dataDir}`);
console.log(`Songs loaded: ${session.songs.length}`);
console.log(
  `Revenue: ${revenue.total_revenue} earned, ${revenue.total_expenses} spent, ${revenue.net_revenue} net`,
);
