import 'reflect-metadata';

export * from './desktop.backend';
export * from './nut/nut.service';
export * from './capture/screen-capture.service';
export * from './accessibility/accessibility.service';
