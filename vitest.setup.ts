import { addRxPlugin } from 'rxdb';
import { RxDBDevModePlugin, disableWarnings } from 'rxdb/plugins/dev-mode';

// Schema and document checks for every database the tests open
disableWarnings();
addRxPlugin(RxDBDevModePlugin);
