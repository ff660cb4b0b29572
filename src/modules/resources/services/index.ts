export { VoicesService } from './voices.service';
export { FilesService } from './files.service';
export { GenerationsService } from './generations.service';
export { AccountService } from './account.service';
