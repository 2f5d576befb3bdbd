// User-facing text shared by the web chat and the Telegram bot.

export const WELCOME_TEXT =
  "¡Hola! 👋 Soy tu cicerone de cerveza personal. Estoy aquí para ayudarte durante tu cata.\n\n" +
  "Puedo ayudarte a:\n" +
  "• Conocer las cervezas disponibles\n" +
  "• Guiarte en la evaluación de cada cerveza\n" +
  "• Predecir cuál será tu favorita\n" +
  "• Sugerir maridajes de comida\n" +
  "• Enseñarte sobre estilos y técnicas de cata\n\n" +
  "¿Por dónde te gustaría empezar?";

export const HELP_TEXT =
  "🍺 Pregúntame lo que quieras sobre cerveza. Por ejemplo:\n" +
  '• "¿Qué cervezas hay disponibles?"\n' +
  '• "Cuéntame sobre la Ippolita"\n' +
  '• "¿Qué comida va bien con esta cerveza?"\n' +
  '• "¿Cuál crees que será mi favorita?"\n\n' +
  "Texto o nota de voz, ¡las dos funcionan!\n" +
  "/nueva empieza una cata desde cero.";

export const NEW_SESSION_TEXT = "🔄 Nueva sesión iniciada. ¿Empezamos otra cata?";
