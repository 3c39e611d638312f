export * from './formats/BitFields';
export * from './formats/PanelCodec';
export * from './formats/PatHeader';
export * from './formats/PatFile';
export * from './formats/PatFileIO';
export * from './config/ConfigLoader';
export * from './util/FileUtil';
export * from './util/Logger';
export * from './util/Utils';
