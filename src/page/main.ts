import { loadConfig } from '@modules/config';
import { mountPage } from './page';
import './page.css';

mountPage(document, { config: loadConfig(import.meta.env) });
