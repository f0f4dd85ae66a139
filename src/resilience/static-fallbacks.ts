/**
 * Static responses used when the pipeline cannot produce an answer of its own.
 */

const WELCOME_MESSAGES = new Map<string, string>([
  ['en', 'Hello! I am the Campus Assistant. Ask me about admissions, fees, exams, hostels, the library or anything else about campus life.'],
  ['hi', 'नमस्ते! मैं कैंपस असिस्टेंट हूँ। आप मुझसे प्रवेश, फीस, परीक्षा, हॉस्टल, लाइब्रेरी या कैंपस से जुड़ी किसी भी बात के बारे में पूछ सकते हैं।'],
  ['gu', 'નમસ્તે! હું કેમ્પસ આસિસ્ટન્ટ છું. પ્રવેશ, ફી, પરીક્ષા, હોસ્ટેલ અથવા લાઇબ્રેરી વિશે મને પૂછો.'],
  ['mr', 'नमस्कार! मी कॅम्पस असिस्टंट आहे. प्रवेश, फी, परीक्षा, वसतिगृह किंवा ग्रंथालयाबद्दल मला विचारा.'],
  ['pa', 'ਸਤ ਸ੍ਰੀ ਅਕਾਲ! ਮੈਂ ਕੈਂਪਸ ਅਸਿਸਟੈਂਟ ਹਾਂ। ਦਾਖਲੇ, ਫੀਸ, ਪ੍ਰੀਖਿਆ, ਹੋਸਟਲ ਜਾਂ ਲਾਇਬ੍ਰੇਰੀ ਬਾਰੇ ਮੈਨੂੰ ਪੁੱਛੋ।'],
  ['ta', 'வணக்கம்! நான் வளாக உதவியாளர். சேர்க்கை, கட்டணம், தேர்வுகள், விடுதி அல்லது நூலகம் பற்றி என்னிடம் கேளுங்கள்.'],
]);

const ORCHESTRATION_ERROR_MESSAGE =
  'Sorry, I could not load our conversation just now. Please try again in a minute.';

/** Localized welcome message, falling back to English. */
export function getWelcomeMessage(language: string): { message: string; language: string } {
  const message = WELCOME_MESSAGES.get(language);
  if (message) return { message, language };
  return { message: WELCOME_MESSAGES.get('en') ?? '', language: 'en' };
}

export function getOrchestrationErrorMessage(): string {
  return ORCHESTRATION_ERROR_MESSAGE;
}
