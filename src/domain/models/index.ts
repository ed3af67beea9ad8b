export { Message, type TemplateData, type PluralCount } from './Message.js';
export {
  createTranslationFileDescriptor,
  type LocaleTag,
  type TranslationFileDescriptor,
} from './TranslationFile.js';
